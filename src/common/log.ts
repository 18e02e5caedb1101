import type { Writable } from "node:stream"

/**
 * Debug trace of client activity.
 */
export interface Logger {
  debug(message: string): void
}

/**
 * Create a logger writing one line per message to `output`.
 *
 * Without an output the trace is dropped, matching the behaviour of a
 * connection opened without `LogOutput`.
 */
export function createLogger(output?: Writable): Logger {
  if (!output) {
    return { debug: () => undefined }
  }

  return {
    debug(message: string) {
      output.write(`${new Date().toISOString()} [fleet] ${message}\n`)
    },
  }
}
