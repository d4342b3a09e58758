export { errorMessage, extractErrorCode, reasonFromCode } from "./error-utils.js";
