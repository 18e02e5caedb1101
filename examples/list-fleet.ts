import { Permission, ResourceType, connect } from "../src/index.js"

/**
 * Example: Walk the fleet
 *
 * Prints every organization, location, robot and part the token can see,
 * and whether the caller may edit each robot's configuration.
 *
 * Usage:
 *   FLEET_APP_ADDRESS=app.example.com:443 FLEET_APP_TOKEN=... \
 *     npx tsx examples/list-fleet.ts
 */

async function main() {
  await connect(
    async (client) => {
      for (const org of await client.listOrganizations()) {
        console.log(`${org.name} (${org.id})`)

        for (const location of await client.listLocations(org)) {
          console.log(`  ${location.name}: ${location.robot_count} robots`)

          for (const robot of await client.listRobots(location)) {
            const granted = await client.checkPermissions(
              ResourceType.Robot,
              robot.id,
              [Permission.UpdateRobotConfig],
            )
            const access = granted.includes(Permission.UpdateRobotConfig)
              ? "editable"
              : "read-only"
            console.log(`    ${robot.name} [${access}]`)

            for (const part of await client.listRobotParts(robot)) {
              const tag = part.main_part ? " (main)" : ""
              console.log(`      ${part.name}${tag} ${part.fqdn}`)
            }
          }
        }
      }
    },
    { LogOutput: process.stderr },
  )
}

main().catch((error) => {
  console.error("Error:", error)
  process.exit(1)
})
