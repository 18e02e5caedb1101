import { FleetSDKError, type FleetSDKErrorOptions } from "./FleetSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface UnknownPermissionErrorOptions extends FleetSDKErrorOptions {
  permission: string
}

/**
 * The service returned a permission code this client does not know.
 * Client and service permission sets are out of sync; upgrade the client.
 */
export class UnknownPermissionError extends FleetSDKError {
  readonly name = ERROR_NAMES.UnknownPermissionError
  readonly code = ERROR_CODES.UnknownPermissionError

  /**
   * The raw permission code returned by the service.
   */
  permission: string

  /**
   * @hidden
   */
  constructor(message: string, options: UnknownPermissionErrorOptions) {
    super(message, options)
    this.permission = options.permission
  }
}
