export { FleetSDKError } from "./FleetSDKError.js"
export type { FleetSDKErrorOptions } from "./FleetSDKError.js"
export { UnknownPermissionError } from "./UnknownPermissionError.js"
export { ConnectionConfigError } from "./ConnectionConfigError.js"
export { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"
export type { ErrorCodes, ErrorNames } from "./errors-codes.js"
