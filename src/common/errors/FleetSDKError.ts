import type { ErrorCodes, ErrorNames } from "./errors-codes.js"

export interface FleetSDKErrorOptions {
  cause?: Error
}

/**
 * The base error. Every other error inherits this error.
 *
 * Only failures raised by the client itself use these classes. Errors
 * returned by the service are surfaced as the `grpc.ServiceError` the
 * transport produced.
 */
export abstract class FleetSDKError extends Error {
  /**
   * The name of the fleet error.
   */
  abstract override readonly name: ErrorNames

  /**
   * The fleet specific error code.
   * Use this to identify fleet errors programmatically.
   */
  abstract readonly code: ErrorCodes

  /**
   * The original error, which caused the FleetSDKError.
   */
  override cause?: Error

  protected constructor(message: string, options?: FleetSDKErrorOptions) {
    super(message)
    this.cause = options?.cause
  }

  /**
   * Pretty prints the error
   */
  printStackTrace() {
    console.log(this.stack)
  }
}
