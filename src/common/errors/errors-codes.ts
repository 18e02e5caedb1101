export const ERROR_CODES = {
  /**
   * {@link UnknownPermissionError}
   */
  UnknownPermissionError: "FLEET_UNKNOWN_PERMISSION",

  /**
   * {@link ConnectionConfigError}
   */
  ConnectionConfigError: "FLEET_CONNECTION_CONFIG",
} as const

type ErrorCodesType = typeof ERROR_CODES
export type ErrorNames = keyof ErrorCodesType
export type ErrorCodes = ErrorCodesType[ErrorNames]

export const ERROR_NAMES = {
  UnknownPermissionError: "UnknownPermissionError",
  ConnectionConfigError: "ConnectionConfigError",
} as const satisfies Record<ErrorNames, ErrorNames>
