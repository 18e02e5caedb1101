import { FleetSDKError, type FleetSDKErrorOptions } from "./FleetSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface ConnectionConfigErrorOptions extends FleetSDKErrorOptions {
  option: string
}

/**
 * A required connection option was neither passed nor set in the
 * environment.
 */
export class ConnectionConfigError extends FleetSDKError {
  readonly name = ERROR_NAMES.ConnectionConfigError
  readonly code = ERROR_CODES.ConnectionConfigError

  /**
   * Name of the missing option, e.g. "Address".
   */
  option: string

  /**
   * @hidden
   */
  constructor(message: string, options: ConnectionConfigErrorOptions) {
    super(message, options)
    this.option = options.option
  }
}
