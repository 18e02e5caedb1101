import { connect } from "../src/index.js"

/**
 * Example: Tail the logs of a robot part
 *
 * Prints the last page of logs, then follows new entries from two
 * consumers sharing one stream: a console printer and an error counter.
 * Stops after 20 error entries.
 *
 * Usage:
 *   FLEET_APP_ADDRESS=app.example.com:443 FLEET_APP_TOKEN=... \
 *     npx tsx examples/tail-logs.ts <part-id>
 */

async function main() {
  const partId = process.argv[2]
  if (!partId) {
    throw new Error("usage: tail-logs.ts <part-id>")
  }

  await connect(
    async (client) => {
      const part = await client.getRobotPart(partId)
      if (!part) {
        throw new Error(`part ${partId} not returned`)
      }
      console.log(`Tailing logs of ${part.name} (${part.fqdn})\n`)

      const page = await client.getLogs(part)
      for (const entry of [...page.logs].reverse()) {
        console.log(`${entry.level}\t${entry.message}`)
      }

      const logs = client.tailLogs(part)
      const output = logs.subscribe()

      const printer = (async () => {
        for await (const batch of output) {
          for (const entry of [...batch].reverse()) {
            console.log(`${entry.level}\t${entry.message}`)
          }
        }
      })()

      // Leaving this loop detaches the counter; the printer keeps the
      // call open until it detaches too.
      let errors = 0
      for await (const batch of logs) {
        errors += batch.filter((entry) => entry.level === "error").length
        if (errors >= 20) break
      }

      console.log(`\n=== ${errors} errors seen, stopping ===`)
      output.unsubscribe()
      await printer
    },
    { LogOutput: process.stderr },
  )
}

main().catch((error) => {
  console.error("Error:", error)
  process.exit(1)
})
