export { isErrnoException, SecurityError, type SecurityErrorCode } from "./errors";
export { MAX_PATH_LENGTH, validateImagePath } from "./path-validation";
export { setSocketPermissions } from "./socket-permissions";
