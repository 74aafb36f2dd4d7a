export { errorCode, formatError } from "./format-error.js";
