import type { Writable } from "node:stream"

/**
 * ConnectOpts defines option used to connect to the App service.
 *
 * Options left unset fall back to the environment.
 */
export interface ConnectOpts {
  /**
   * `host:port` of the App service.
   * Defaults to `FLEET_APP_ADDRESS`.
   */
  Address?: string

  /**
   * Access token sent with every call.
   * Defaults to `FLEET_APP_TOKEN`.
   */
  Token?: string

  /**
   * Use a plaintext channel instead of TLS.
   * Defaults to `FLEET_APP_INSECURE` ("1" or "true"), else false.
   */
  Insecure?: boolean

  /**
   * Writable receiving the client's debug trace.
   */
  LogOutput?: Writable
}

/**
 * Connection settings once defaults are applied
 */
export interface ResolvedConnectOpts {
  address: string
  token: string
  insecure: boolean
  logOutput?: Writable
}
