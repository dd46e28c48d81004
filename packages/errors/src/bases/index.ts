export { ExternalError } from "./external-error.js";
export { InternalError } from "./internal-error.js";
export { ValidationError } from "./validation-error.js";
