export { ConfigValidationError } from "./config-error.js";
export { InternalError } from "./internal-error.js";
