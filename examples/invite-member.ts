import * as grpc from "@grpc/grpc-js"

import { OrganizationAuthorization, connect } from "../src/index.js"

/**
 * Example: Invite an operator to a location
 *
 * Usage:
 *   FLEET_APP_ADDRESS=app.example.com:443 FLEET_APP_TOKEN=... \
 *     npx tsx examples/invite-member.ts <org-id> <location-id> <email>
 */

async function main() {
  const [organizationId, locationId, email] = process.argv.slice(2)
  if (!organizationId || !locationId || !email) {
    throw new Error("usage: invite-member.ts <org-id> <location-id> <email>")
  }

  await connect(async (client) => {
    const org = await client.getOrganization(organizationId)
    if (!org) {
      throw new Error(`organization ${organizationId} not returned`)
    }
    const grant = OrganizationAuthorization.forLocation("operator", org.id, locationId)

    try {
      await client.createOrganizationInvite(org, email, [grant])
      console.log(`Invited ${email} to ${org.name}`)
    } catch (error) {
      const code = error instanceof Error && "code" in error ? error.code : undefined
      if (code === grpc.status.ALREADY_EXISTS) {
        await client.resendOrganizationInvite(org, email)
        console.log(`Resent the pending invite of ${email}`)
        return
      }
      throw error
    }
  })
}

main().catch((error) => {
  console.error("Error:", error)
  process.exit(1)
})
