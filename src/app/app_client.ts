import * as grpc from "@grpc/grpc-js"

import type { AppServiceMethods, UnaryMethod } from "../common/grpc/client.js"
import { callUnary } from "../common/grpc/client.js"
import { BroadcastStream } from "../common/grpc/broadcast.js"
import type { Logger } from "../common/log.js"
import { createLogger } from "../common/log.js"
import type { JsonObject } from "../common/struct.js"
import { toStruct } from "../common/struct.js"
import type {
  Authorization,
  CheckPermissionsRequest,
  CreateOrganizationInviteRequest,
  DeleteOrganizationInviteRequest,
  DeleteOrganizationMemberRequest,
  Fragment,
  GetFragmentRequest,
  GetLocationRequest,
  GetOrganizationRequest,
  GetRobotPartLogsRequest,
  GetRobotPartLogsResponse,
  GetRobotPartRequest,
  GetRobotPartsRequest,
  GetRobotRequest,
  ListAuthorizationsRequest,
  ListLocationsRequest,
  ListOrganizationMembersRequest,
  ListOrganizationMembersResponse,
  ListOrganizationsRequest,
  ListRobotsRequest,
  Location,
  LogEntry,
  NewRobotRequest,
  Organization,
  OrganizationInvite,
  ResendOrganizationInviteRequest,
  Robot,
  RobotPart,
  TailRobotPartLogsRequest,
  TailRobotPartLogsResponse,
  UpdateRobotPartRequest,
} from "../grpc/types.js"
import type { OrganizationAuthorization, ResourceType } from "./permissions.js"
import { decodePermission, type Permission } from "./permissions.js"

/**
 * One page of logs, newest first, with the token of the next page
 */
export type RobotPartLogPage = GetRobotPartLogsResponse

/**
 * Live log batches of a part, shared between subscribers
 */
export type LogStream = BroadcastStream<TailRobotPartLogsResponse, LogEntry[]>

export interface GetLogsOptions {
  /** Only return entries at error level */
  errorsOnly?: boolean
  /** Token from a previous page; empty for the first page */
  pageToken?: string
}

export interface TailLogsOptions {
  /** Only stream entries at error level */
  errorsOnly?: boolean
  /** Unread batches a subscriber may hold before reading pauses */
  maxBuffered?: number
}

export interface ListAuthorizationsOptions {
  /** Restrict the result to these resources */
  resourceIds?: string[]
}

/**
 * gRPC client for the App service
 *
 * Every method performs exactly one remote call: it builds the request
 * from its arguments, invokes the RPC and returns the part of the
 * response the caller needs. Errors returned by the service are thrown
 * as received (`grpc.ServiceError`); there is no retry. Methods returning
 * a single record resolve to `null` when the response leaves it unset.
 *
 * All calls must be authenticated: pass the metadata carrying the
 * access token, or use {@link connect}.
 *
 * @example
 * ```typescript
 * const client = new AppClient(manager.getClient(), manager.getMetadata())
 * const [org] = await client.listOrganizations()
 * const locations = await client.listLocations(org)
 * ```
 */
export class AppClient {
  private readonly client: AppServiceMethods
  private readonly metadata: grpc.Metadata
  private readonly logger: Logger

  constructor(
    client: AppServiceMethods,
    metadata: grpc.Metadata = new grpc.Metadata(),
    logger: Logger = createLogger(),
  ) {
    this.client = client
    this.metadata = metadata
    this.logger = logger
  }

  /**
   * List all the organizations the authenticated user has access to
   */
  async listOrganizations(): Promise<Organization[]> {
    const request: ListOrganizationsRequest = {}
    const response = await this.call(
      "ListOrganizations",
      this.client.ListOrganizations,
      request,
    )
    return response.organizations
  }

  /**
   * Get a specific organization by ID
   */
  async getOrganization(organizationId: string): Promise<Organization | null> {
    const request: GetOrganizationRequest = { organization_id: organizationId }
    const response = await this.call(
      "GetOrganization",
      this.client.GetOrganization,
      request,
    )
    return response.organization
  }

  /**
   * List the locations of an organization the authenticated user has
   * access to
   */
  async listLocations(
    organization: Pick<Organization, "id">,
  ): Promise<Location[]> {
    const request: ListLocationsRequest = { organization_id: organization.id }
    const response = await this.call(
      "ListLocations",
      this.client.ListLocations,
      request,
    )
    return response.locations
  }

  /**
   * Get a specific location by ID
   */
  async getLocation(locationId: string): Promise<Location | null> {
    const request: GetLocationRequest = { location_id: locationId }
    const response = await this.call("GetLocation", this.client.GetLocation, request)
    return response.location
  }

  /**
   * List the robots of a location the authenticated user has access to
   */
  async listRobots(location: Pick<Location, "id">): Promise<Robot[]> {
    const request: ListRobotsRequest = { location_id: location.id }
    const response = await this.call("ListRobots", this.client.ListRobots, request)
    return response.robots
  }

  /**
   * Get a specific robot by ID
   */
  async getRobot(robotId: string): Promise<Robot | null> {
    const request: GetRobotRequest = { id: robotId }
    const response = await this.call("GetRobot", this.client.GetRobot, request)
    return response.robot
  }

  /**
   * List the parts of a robot
   */
  async listRobotParts(robot: Pick<Robot, "id">): Promise<RobotPart[]> {
    const request: GetRobotPartsRequest = { robot_id: robot.id }
    const response = await this.call(
      "GetRobotParts",
      this.client.GetRobotParts,
      request,
    )
    return response.parts
  }

  /**
   * Get a specific robot part by ID
   */
  async getRobotPart(partId: string): Promise<RobotPart | null> {
    const request: GetRobotPartRequest = { id: partId }
    const response = await this.call(
      "GetRobotPart",
      this.client.GetRobotPart,
      request,
    )
    return response.part
  }

  /**
   * Rename a robot part and replace its configuration
   *
   * @param robotConfig - The full configuration document; use `fromStruct`
   * on a part's `robot_config` to start from the current one
   * @returns The part as stored by the service
   */
  async updateRobotPart(
    partId: string,
    name: string,
    robotConfig: JsonObject,
  ): Promise<RobotPart | null> {
    const request: UpdateRobotPartRequest = {
      id: partId,
      name,
      robot_config: toStruct(robotConfig),
    }
    const response = await this.call(
      "UpdateRobotPart",
      this.client.UpdateRobotPart,
      request,
    )
    return response.part
  }

  /**
   * Get a page of logs for a robot part. Logs are sorted by descending time
   * (newest first)
   *
   * Pass the returned `next_page_token` as `pageToken` to fetch the next
   * page.
   */
  async getLogs(
    part: Pick<RobotPart, "id">,
    options: GetLogsOptions = {},
  ): Promise<RobotPartLogPage> {
    const request: GetRobotPartLogsRequest = {
      id: part.id,
      errors_only: options.errorsOnly ?? false,
      page_token: options.pageToken ?? "",
    }
    return this.call("GetRobotPartLogs", this.client.GetRobotPartLogs, request)
  }

  /**
   * Stream the logs of a robot part as they are written. Each batch is
   * sorted by descending time (newest first)
   *
   * The call is opened immediately and shared by every subscriber of the
   * returned stream; it is cancelled when the last subscriber detaches.
   * A stream that is never subscribed stays open until `cancel()` is
   * called on it or the connection closes.
   *
   * Each subscriber buffers the batches it has not read yet. Once one of
   * them holds `maxBuffered` batches, reading pauses for everyone until it
   * catches up.
   *
   * @example
   * ```typescript
   * for await (const batch of client.tailLogs(part, { errorsOnly: true })) {
   *   for (const entry of batch) {
   *     console.log(`${entry.level}: ${entry.message}`)
   *   }
   * }
   * ```
   */
  tailLogs(part: Pick<RobotPart, "id">, options: TailLogsOptions = {}): LogStream {
    const request: TailRobotPartLogsRequest = {
      id: part.id,
      errors_only: options.errorsOnly ?? false,
    }

    this.logger.debug("AppService/TailRobotPartLogs")
    const stream = this.client.TailRobotPartLogs(request, this.metadata)

    return new BroadcastStream(stream, (response) => response.logs, {
      label: `AppService/TailRobotPartLogs ${part.id}`,
      logger: this.logger,
      maxBuffered: options.maxBuffered,
    })
  }

  /**
   * List the authorizations of an organization
   */
  async listAuthorizations(
    organizationId: string,
    options: ListAuthorizationsOptions = {},
  ): Promise<Authorization[]> {
    const request: ListAuthorizationsRequest = {
      organization_id: organizationId,
      resource_ids: options.resourceIds ?? [],
    }
    const response = await this.call(
      "ListAuthorizations",
      this.client.ListAuthorizations,
      request,
    )
    return response.authorizations
  }

  /**
   * Check which of `permissions` the authenticated user holds on a resource
   *
   * @returns The granted subset; empty if the resource has no
   * authorization entry
   * @throws UnknownPermissionError if the service grants a permission this
   * client does not know
   */
  async checkPermissions(
    resourceType: ResourceType,
    resourceId: string,
    permissions: Permission[],
  ): Promise<Permission[]> {
    const request: CheckPermissionsRequest = {
      permissions: [
        {
          resource_type: resourceType,
          resource_id: resourceId,
          permissions: [...permissions],
        },
      ],
    }
    const response = await this.call(
      "CheckPermissions",
      this.client.CheckPermissions,
      request,
    )

    if (response.authorized_permissions.length === 0) return []
    return response.authorized_permissions[0].permissions.map(decodePermission)
  }

  /**
   * List the members and pending invites of an organization
   */
  async listOrganizationMembers(
    organization: Pick<Organization, "id">,
  ): Promise<ListOrganizationMembersResponse> {
    const request: ListOrganizationMembersRequest = {
      organization_id: organization.id,
    }
    return this.call(
      "ListOrganizationMembers",
      this.client.ListOrganizationMembers,
      request,
    )
  }

  /**
   * Invite an email address to join an organization, with the grants
   * given in `authorizations`
   */
  async createOrganizationInvite(
    organization: Pick<Organization, "id">,
    email: string,
    authorizations: OrganizationAuthorization[],
  ): Promise<OrganizationInvite | null> {
    const request: CreateOrganizationInviteRequest = {
      organization_id: organization.id,
      email,
      authorizations: authorizations.map((authorization) =>
        authorization.toMessage(),
      ),
    }
    const response = await this.call(
      "CreateOrganizationInvite",
      this.client.CreateOrganizationInvite,
      request,
    )
    return response.invite
  }

  async resendOrganizationInvite(
    organization: Pick<Organization, "id">,
    email: string,
  ): Promise<OrganizationInvite | null> {
    const request: ResendOrganizationInviteRequest = {
      organization_id: organization.id,
      email,
    }
    const response = await this.call(
      "ResendOrganizationInvite",
      this.client.ResendOrganizationInvite,
      request,
    )
    return response.invite
  }

  async deleteOrganizationInvite(
    organization: Pick<Organization, "id">,
    email: string,
  ): Promise<void> {
    const request: DeleteOrganizationInviteRequest = {
      organization_id: organization.id,
      email,
    }
    await this.call(
      "DeleteOrganizationInvite",
      this.client.DeleteOrganizationInvite,
      request,
    )
  }

  async deleteOrganizationMember(
    organization: Pick<Organization, "id">,
    userId: string,
  ): Promise<void> {
    const request: DeleteOrganizationMemberRequest = {
      organization_id: organization.id,
      user_id: userId,
    }
    await this.call(
      "DeleteOrganizationMember",
      this.client.DeleteOrganizationMember,
      request,
    )
  }

  /**
   * Create a new machine named `name` in the given location
   *
   * @returns The ID of the new robot
   */
  async newMachine(name: string, locationId: string): Promise<string> {
    const request: NewRobotRequest = { name, location: locationId }
    const response = await this.call("NewRobot", this.client.NewRobot, request)
    return response.id
  }

  /**
   * Get a specific fragment by ID
   */
  async getFragment(fragmentId: string): Promise<Fragment | null> {
    const request: GetFragmentRequest = { id: fragmentId }
    const response = await this.call("GetFragment", this.client.GetFragment, request)
    return response.fragment
  }

  private call<TRequest, TResponse>(
    name: string,
    method: UnaryMethod<TRequest, TResponse>,
    request: TRequest,
  ): Promise<TResponse> {
    this.logger.debug(`AppService/${name}`)
    return callUnary(method.bind(this.client), request, this.metadata)
  }
}
