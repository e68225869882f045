export { registerSelectCommand } from "./select.js";
export { registerValidateCommand } from "./validate.js";
