/**
 * Tests for the App service client
 *
 * Every call goes to FakeAppService, which answers in process.
 */

import assert from "assert"
import * as grpc from "@grpc/grpc-js"

import { UnknownPermissionError } from "../../common/errors/index.js"
import { createAuthMetadata } from "../../common/grpc/client.js"
import type { Logger } from "../../common/log.js"
import { fromStruct } from "../../common/struct.js"
import type { LogEntry } from "../../grpc/types.js"
import { AppClient } from "../app_client.js"
import { OrganizationAuthorization, Permission, ResourceType } from "../permissions.js"
import {
  FakeAppService,
  fakeUnaryCall,
  location,
  logEntry,
  organization,
  robot,
  robotPart,
} from "./fake_app_service.js"

function messagesOf(entries: LogEntry[]): string[] {
  return entries.map((entry) => entry.message)
}

describe("AppClient", function () {
  let service: FakeAppService
  let client: AppClient
  let trace: string[]

  beforeEach(function () {
    service = new FakeAppService()
    service.organizations = [organization("org-1"), organization("org-2")]
    service.locations = [
      location("loc-1", "org-1"),
      location("loc-2", "org-1"),
      location("loc-3", "org-2"),
    ]
    service.robots = [robot("robot-1", "loc-1"), robot("robot-2", "loc-2")]
    service.parts = [
      robotPart("part-1", "robot-1"),
      robotPart("part-2", "robot-1"),
      robotPart("part-3", "robot-2"),
    ]

    trace = []
    const logger: Logger = { debug: (message) => trace.push(message) }
    client = new AppClient(service, createAuthMetadata("test-token"), logger)
  })

  describe("calls", function () {
    it("should send the access token with every call", async function () {
      await client.listOrganizations()
      await client.getRobot("robot-1")

      for (const call of service.calls) {
        assert.deepStrictEqual(call.metadata.get("authorization"), [
          "Bearer test-token",
        ])
      }
    })

    it("should make exactly one call per operation", async function () {
      await client.getOrganization("org-1")
      await client.listRobotParts({ id: "robot-1" })

      assert.deepStrictEqual(service.methodsCalled(), [
        "GetOrganization",
        "GetRobotParts",
      ])
    })

    it("should trace each call", async function () {
      await client.listOrganizations()
      await client.getLocation("loc-2")

      assert.deepStrictEqual(trace, [
        "AppService/ListOrganizations",
        "AppService/GetLocation",
      ])
    })

    it("should pass service errors through unchanged", async function () {
      await assert.rejects(client.getRobot("robot-404"), {
        code: grpc.status.NOT_FOUND,
        details: "robot-404 not found",
      })
    })
  })

  describe("organizations", function () {
    it("should list organizations", async function () {
      const organizations = await client.listOrganizations()

      assert.deepStrictEqual(
        organizations.map((org) => org.id),
        ["org-1", "org-2"],
      )
    })

    it("should get the organization with the requested id", async function () {
      const org = await client.getOrganization("org-2")

      assert.strictEqual(org?.id, "org-2")
      assert.strictEqual(org?.name, "org org-2")
      assert.deepStrictEqual(service.calls[0].request, {
        organization_id: "org-2",
      })
    })
  })

  describe("locations and robots", function () {
    it("should list the locations of an organization", async function () {
      const locations = await client.listLocations({ id: "org-1" })

      assert.deepStrictEqual(
        locations.map((loc) => loc.id),
        ["loc-1", "loc-2"],
      )
    })

    it("should get a location by id", async function () {
      const loc = await client.getLocation("loc-3")

      assert.strictEqual(loc?.id, "loc-3")
      assert.strictEqual(loc?.organizations[0].organization_id, "org-2")
    })

    it("should list the robots of a location", async function () {
      const robots = await client.listRobots({ id: "loc-2" })

      assert.deepStrictEqual(
        robots.map((r) => r.id),
        ["robot-2"],
      )
    })

    it("should create a machine and return its id", async function () {
      const id = await client.newMachine("rover", "loc-1")

      assert.strictEqual(id, "robot-new-1")
      assert.deepStrictEqual(service.calls[0].request, {
        name: "rover",
        location: "loc-1",
      })

      const robots = await client.listRobots({ id: "loc-1" })
      assert.deepStrictEqual(
        robots.map((r) => r.name),
        ["robot robot-1", "rover"],
      )
    })
  })

  describe("robot parts", function () {
    it("should only list the parts of the requested robot", async function () {
      const parts = await client.listRobotParts({ id: "robot-1" })

      assert.deepStrictEqual(
        parts.map((part) => part.id),
        ["part-1", "part-2"],
      )
      for (const part of parts) {
        assert.strictEqual(part.robot, "robot-1")
      }
    })

    it("should get a part by id", async function () {
      const part = await client.getRobotPart("part-3")

      assert.strictEqual(part?.id, "part-3")
      assert.strictEqual(part?.robot, "robot-2")
    })

    it("should read back the configuration written by updateRobotPart", async function () {
      const config = {
        components: [
          { name: "left-arm", type: "arm", attributes: { port: 8080 } },
        ],
        debug: true,
        network: null,
      }

      const updated = await client.updateRobotPart("part-1", "main", config)
      assert.strictEqual(updated?.name, "main")

      const fetched = await client.getRobotPart("part-1")
      assert.strictEqual(fetched?.name, "main")
      assert.deepStrictEqual(
        fromStruct(fetched?.robot_config ?? { fields: {} }),
        config,
      )
    })
  })

  describe("getLogs()", function () {
    beforeEach(function () {
      service.logs.set("part-1", [
        logEntry("fourth", 40),
        logEntry("third", 30, "error"),
        logEntry("second", 20),
        logEntry("first", 10),
      ])
    })

    it("should return the first page, newest first", async function () {
      const page = await client.getLogs({ id: "part-1" })

      assert.deepStrictEqual(messagesOf(page.logs), ["fourth", "third"])
      assert.strictEqual(page.next_page_token, "2")
      assert.deepStrictEqual(service.calls[0].request, {
        id: "part-1",
        errors_only: false,
        page_token: "",
      })
    })

    it("should follow page tokens until the last page", async function () {
      const seconds: string[] = []
      let pageToken = ""
      do {
        const page = await client.getLogs({ id: "part-1" }, { pageToken })
        seconds.push(...page.logs.map((entry) => entry.time?.seconds ?? ""))
        pageToken = page.next_page_token
      } while (pageToken !== "")

      assert.deepStrictEqual(seconds, ["40", "30", "20", "10"])
      assert.strictEqual(service.calls.length, 2)
    })

    it("should only return errors when asked", async function () {
      const page = await client.getLogs({ id: "part-1" }, { errorsOnly: true })

      assert.deepStrictEqual(messagesOf(page.logs), ["third"])
      assert.strictEqual(page.next_page_token, "")
    })
  })

  describe("tailLogs()", function () {
    it("should open one call shared by every subscriber", async function () {
      const stream = client.tailLogs({ id: "part-1" }, { errorsOnly: true })
      const first = stream.subscribe()
      const second = stream.subscribe()

      assert.deepStrictEqual(service.methodsCalled(), ["TailRobotPartLogs"])
      assert.deepStrictEqual(service.calls[0].request, {
        id: "part-1",
        errors_only: true,
      })

      service.tails[0].emitBatch([logEntry("overheat", 5, "error")])

      const a = await first.next()
      const b = await second.next()
      assert.strictEqual(a.done, false)
      assert.strictEqual(b.done, false)
      assert.strictEqual(a.value, b.value)

      first.unsubscribe()
      assert.strictEqual(service.tails[0].cancelCount, 0)
      second.unsubscribe()
      assert.strictEqual(service.tails[0].cancelCount, 1)
    })

    it("should deliver batches to a for await loop", async function () {
      const stream = client.tailLogs({ id: "part-2" })
      service.tails[0].emitBatch([logEntry("b", 2), logEntry("a", 1)])
      service.tails[0].finish()

      const seen: string[][] = []
      for await (const batch of stream) {
        seen.push(messagesOf(batch))
      }

      assert.deepStrictEqual(seen, [["b", "a"]])
      assert.strictEqual(service.tails[0].cancelCount, 0)
    })
  })

  describe("permissions", function () {
    it("should return the granted subset of the requested permissions", async function () {
      service.grants.set("robot/robot-1", ["read_robot", "read_robot_logs"])

      const granted = await client.checkPermissions(ResourceType.Robot, "robot-1", [
        Permission.ReadRobot,
        Permission.UpdateRobot,
      ])

      assert.deepStrictEqual(granted, [Permission.ReadRobot])
      assert.deepStrictEqual(service.calls[0].request, {
        permissions: [
          {
            resource_type: "robot",
            resource_id: "robot-1",
            permissions: ["read_robot", "update_robot"],
          },
        ],
      })
    })

    it("should return nothing for a resource without grants", async function () {
      const granted = await client.checkPermissions(
        ResourceType.Location,
        "loc-9",
        [Permission.ReadLocation],
      )

      assert.deepStrictEqual(granted, [])
    })

    it("should reject permission codes it does not know", async function () {
      service.CheckPermissions = (request, metadata, callback) => {
        setImmediate(() =>
          callback(null, {
            authorized_permissions: [
              {
                resource_type: "robot",
                resource_id: "robot-1",
                permissions: ["read_robot", "launch_rockets"],
              },
            ],
          }),
        )
        return fakeUnaryCall()
      }

      await assert.rejects(
        client.checkPermissions(ResourceType.Robot, "robot-1", [
          Permission.ReadRobot,
        ]),
        (error) =>
          error instanceof UnknownPermissionError &&
          error.permission === "launch_rockets",
      )
    })

    it("should list authorizations for the requested resources", async function () {
      const authorizations = await client.listAuthorizations("org-1", {
        resourceIds: ["robot-1"],
      })

      assert.deepStrictEqual(authorizations, [])
      assert.deepStrictEqual(service.calls[0].request, {
        organization_id: "org-1",
        resource_ids: ["robot-1"],
      })
    })
  })

  describe("members and invites", function () {
    const org = { id: "org-1" }

    beforeEach(function () {
      service.members = [{ user_id: "user-1", emails: ["member@example.com"] }]
    })

    it("should create an invite carrying the role grants", async function () {
      const invite = await client.createOrganizationInvite(
        org,
        "new.member@example.com",
        [OrganizationAuthorization.forLocation("operator", "org-1", "loc-1")],
      )

      assert.strictEqual(invite?.email, "new.member@example.com")
      assert.deepStrictEqual(invite?.authorizations, [
        {
          authorization_type: "role",
          authorization_id: "operator",
          resource_type: "location",
          resource_id: "loc-1",
          identity_id: "",
          organization_id: "org-1",
          identity_type: "",
        },
      ])
    })

    it("should surface the service error for an already invited email", async function () {
      await client.createOrganizationInvite(org, "new.member@example.com", [])

      await assert.rejects(
        client.createOrganizationInvite(org, "new.member@example.com", []),
        {
          code: grpc.status.ALREADY_EXISTS,
          details: "new.member@example.com is already a member or invited",
        },
      )
    })

    it("should surface the service error for an existing member", async function () {
      await assert.rejects(
        client.createOrganizationInvite(org, "member@example.com", [
          OrganizationAuthorization.forOrganization("owner", "org-1"),
        ]),
        { code: grpc.status.ALREADY_EXISTS },
      )
    })

    it("should resend a pending invite", async function () {
      await client.createOrganizationInvite(org, "new.member@example.com", [])

      const invite = await client.resendOrganizationInvite(
        org,
        "new.member@example.com",
      )

      assert.strictEqual(invite?.organization_id, "org-1")
      assert.strictEqual(invite?.email, "new.member@example.com")
    })

    it("should list members and pending invites", async function () {
      await client.createOrganizationInvite(org, "new.member@example.com", [])

      const listing = await client.listOrganizationMembers(org)

      assert.strictEqual(listing.organization_id, "org-1")
      assert.deepStrictEqual(
        listing.members.map((member) => member.user_id),
        ["user-1"],
      )
      assert.deepStrictEqual(
        listing.invites.map((invite) => invite.email),
        ["new.member@example.com"],
      )
    })

    it("should delete an invite", async function () {
      await client.createOrganizationInvite(org, "new.member@example.com", [])
      await client.deleteOrganizationInvite(org, "new.member@example.com")

      const listing = await client.listOrganizationMembers(org)
      assert.deepStrictEqual(listing.invites, [])
    })

    it("should delete a member", async function () {
      await client.deleteOrganizationMember(org, "user-1")

      const listing = await client.listOrganizationMembers(org)
      assert.deepStrictEqual(listing.members, [])
      assert.deepStrictEqual(service.calls[0].request, {
        organization_id: "org-1",
        user_id: "user-1",
      })
    })
  })

  describe("getFragment()", function () {
    it("should get a fragment by id", async function () {
      service.fragments = [
        {
          id: "frag-1",
          name: "base rover",
          fragment: { fields: { wheels: { numberValue: 4 } } },
          organization_owner: "org-1",
          public: false,
          organization_name: "org org-1",
          robot_part_count: 2,
          organization_count: 1,
          only_used_by_owner: true,
        },
      ]

      const fragment = await client.getFragment("frag-1")

      assert.strictEqual(fragment?.name, "base rover")
      assert.deepStrictEqual(fromStruct(fragment?.fragment ?? { fields: {} }), {
        wheels: 4,
      })
    })
  })
})
