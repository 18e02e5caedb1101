import { AppClient } from "./app/app_client.js"
import { ConnectionConfigError } from "./common/errors/index.js"
import { GRPCConnectionManager } from "./common/grpc/connection.js"
import { createLogger } from "./common/log.js"
import type { ConnectOpts, ResolvedConnectOpts } from "./connectOpts.js"

export type CallbackFct = (client: AppClient) => Promise<void>

/**
 * Apply environment defaults to the connection options
 *
 * @throws ConnectionConfigError if no address or token is available
 */
export function resolveConnectOpts(
  opts: ConnectOpts = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConnectOpts {
  const address = opts.Address ?? env["FLEET_APP_ADDRESS"]
  if (!address) {
    throw new ConnectionConfigError(
      "no App service address: set the Address option or FLEET_APP_ADDRESS",
      { option: "Address" },
    )
  }

  const token = opts.Token ?? env["FLEET_APP_TOKEN"]
  if (!token) {
    throw new ConnectionConfigError(
      "no access token: set the Token option or FLEET_APP_TOKEN",
      { option: "Token" },
    )
  }

  const insecureEnv = env["FLEET_APP_INSECURE"]
  const insecure =
    opts.Insecure ?? (insecureEnv === "1" || insecureEnv === "true")

  return { address, token, insecure, logOutput: opts.LogOutput }
}

/**
 * connect runs the callback with an AppClient connected to the App service.
 * The connection is closed once the callback settles.
 *
 * @param cb Callback function to execute
 * @param config options
 */
export async function connect(
  cb: CallbackFct,
  config: ConnectOpts = {},
): Promise<void> {
  const opts = resolveConnectOpts(config)
  const logger = createLogger(opts.logOutput)
  const manager = new GRPCConnectionManager(
    opts.address,
    opts.token,
    opts.insecure,
  )

  logger.debug(`connecting to ${opts.address}`)
  try {
    await cb(new AppClient(manager.getClient(), manager.getMetadata(), logger))
  } finally {
    manager.close()
    logger.debug(`closed connection to ${opts.address}`)
  }
}
