/**
 * TypeScript types for the gRPC App service
 * Based on proto/app.proto
 *
 * Field names match the wire names since the proto is loaded with
 * `keepCase`. Entities returned by the service are readonly: build a new
 * request instead of editing a record and sending it back.
 *
 * Message-typed fields decode as `null` when the sender left them unset
 * (proto-loader `defaults`).
 */

/**
 * google.protobuf.Timestamp, with `seconds` decoded as a decimal string
 */
export interface Timestamp {
  seconds: string
  nanos: number
}

/**
 * google.protobuf.NullValue, decoded as its enum name
 */
export type NullValue = "NULL_VALUE"

/**
 * google.protobuf.Value. Exactly one of the `*Value` fields is set;
 * `kind` names it on decoded messages.
 *
 * The well-known types come from the definitions bundled with protobufjs,
 * which keep camelCase field names whatever `keepCase` says.
 */
export interface Value {
  nullValue?: NullValue
  numberValue?: number
  stringValue?: string
  boolValue?: boolean
  structValue?: Struct
  listValue?: ListValue
  kind?:
    | "nullValue"
    | "numberValue"
    | "stringValue"
    | "boolValue"
    | "structValue"
    | "listValue"
}

/**
 * google.protobuf.ListValue
 */
export interface ListValue {
  values: Value[]
}

/**
 * google.protobuf.Struct: an open key/value document
 */
export interface Struct {
  fields: { [key: string]: Value }
}

// ----------------------------------------------------------------------------
// Entities
// ----------------------------------------------------------------------------

/**
 * Billing and access boundary. Owns locations.
 */
export interface Organization {
  readonly id: string
  readonly name: string
  readonly created_on?: Timestamp | null
  readonly public_namespace: string
  readonly default_region: string
}

export interface LocationOrganization {
  readonly organization_id: string
  readonly primary: boolean
}

/**
 * Grouping of robots under one or more organizations
 */
export interface Location {
  readonly id: string
  readonly name: string
  readonly parent_location_id: string
  readonly organizations: readonly LocationOrganization[]
  readonly created_on?: Timestamp | null
  readonly robot_count: number
}

/**
 * A managed machine
 */
export interface Robot {
  readonly id: string
  readonly name: string
  /** ID of the owning location */
  readonly location: string
  readonly last_access?: Timestamp | null
  readonly created_on?: Timestamp | null
}

/**
 * A configurable unit of a robot
 */
export interface RobotPart {
  readonly id: string
  readonly name: string
  readonly dns_name: string
  readonly secret: string
  /** ID of the owning robot */
  readonly robot: string
  readonly location_id: string
  readonly robot_config?: Struct | null
  readonly last_access?: Timestamp | null
  readonly main_part: boolean
  readonly fqdn: string
  readonly local_fqdn: string
  readonly created_on?: Timestamp | null
}

/**
 * One log record emitted by a robot part
 */
export interface LogEntry {
  readonly host: string
  /** Level name: "debug" | "info" | "warn" | "error" */
  readonly level: string
  readonly time?: Timestamp | null
  readonly logger_name: string
  readonly message: string
  readonly caller?: Struct | null
  readonly stack: string
  readonly fields: readonly Struct[]
}

/**
 * Access grant relating an identity to a resource
 */
export interface Authorization {
  /** Grant kind, e.g. "role" */
  authorization_type: string
  /** Role name, e.g. "owner" or "operator" */
  authorization_id: string
  resource_type: string
  resource_id: string
  identity_id: string
  organization_id: string
  identity_type: string
}

/**
 * Raw permission codes held on one resource
 */
export interface AuthorizedPermissions {
  resource_type: string
  resource_id: string
  permissions: string[]
}

export interface OrganizationMember {
  readonly user_id: string
  readonly emails: readonly string[]
  readonly date_added?: Timestamp | null
  readonly last_login?: Timestamp | null
}

/**
 * Pending invitation to join an organization
 */
export interface OrganizationInvite {
  readonly organization_id: string
  readonly email: string
  readonly created_on?: Timestamp | null
  readonly authorizations: readonly Authorization[]
}

/**
 * Named, reusable configuration document
 */
export interface Fragment {
  readonly id: string
  readonly name: string
  readonly fragment?: Struct | null
  readonly organization_owner: string
  readonly public: boolean
  readonly created_on?: Timestamp | null
  readonly organization_name: string
  readonly robot_part_count: number
  readonly organization_count: number
  readonly only_used_by_owner: boolean
}

// ----------------------------------------------------------------------------
// Organizations
// ----------------------------------------------------------------------------

export interface ListOrganizationsRequest {}

export interface ListOrganizationsResponse {
  organizations: Organization[]
}

export interface GetOrganizationRequest {
  organization_id: string
}

export interface GetOrganizationResponse {
  organization: Organization | null
}

export interface ListOrganizationMembersRequest {
  organization_id: string
}

/**
 * Members and pending invites of an organization
 */
export interface ListOrganizationMembersResponse {
  organization_id: string
  members: OrganizationMember[]
  invites: OrganizationInvite[]
}

export interface CreateOrganizationInviteRequest {
  organization_id: string
  email: string
  authorizations: Authorization[]
}

export interface CreateOrganizationInviteResponse {
  invite: OrganizationInvite | null
}

export interface ResendOrganizationInviteRequest {
  organization_id: string
  email: string
}

export interface ResendOrganizationInviteResponse {
  invite: OrganizationInvite | null
}

export interface DeleteOrganizationInviteRequest {
  organization_id: string
  email: string
}

export interface DeleteOrganizationInviteResponse {}

export interface DeleteOrganizationMemberRequest {
  organization_id: string
  user_id: string
}

export interface DeleteOrganizationMemberResponse {}

// ----------------------------------------------------------------------------
// Locations
// ----------------------------------------------------------------------------

export interface ListLocationsRequest {
  organization_id: string
}

export interface ListLocationsResponse {
  locations: Location[]
}

export interface GetLocationRequest {
  location_id: string
}

export interface GetLocationResponse {
  location: Location | null
}

// ----------------------------------------------------------------------------
// Robots
// ----------------------------------------------------------------------------

export interface ListRobotsRequest {
  location_id: string
}

export interface ListRobotsResponse {
  robots: Robot[]
}

export interface GetRobotRequest {
  id: string
}

export interface GetRobotResponse {
  robot: Robot | null
}

export interface NewRobotRequest {
  name: string
  /** ID of the location the robot is created in */
  location: string
}

export interface NewRobotResponse {
  id: string
}

// ----------------------------------------------------------------------------
// Robot parts
// ----------------------------------------------------------------------------

export interface GetRobotPartsRequest {
  robot_id: string
}

export interface GetRobotPartsResponse {
  parts: RobotPart[]
}

export interface GetRobotPartRequest {
  id: string
}

export interface GetRobotPartResponse {
  part: RobotPart | null
  config_json: string
}

export interface UpdateRobotPartRequest {
  id: string
  name: string
  robot_config: Struct
}

export interface UpdateRobotPartResponse {
  part: RobotPart | null
}

// ----------------------------------------------------------------------------
// Logs
// ----------------------------------------------------------------------------

export interface GetRobotPartLogsRequest {
  id: string
  errors_only: boolean
  /** Opaque, server-issued. Empty = first page */
  page_token: string
}

/**
 * One page of logs, newest first, and the token of the next page
 */
export interface GetRobotPartLogsResponse {
  logs: LogEntry[]
  next_page_token: string
}

export interface TailRobotPartLogsRequest {
  id: string
  errors_only: boolean
}

/**
 * One batch pushed by the tail stream, newest first
 */
export interface TailRobotPartLogsResponse {
  logs: LogEntry[]
}

// ----------------------------------------------------------------------------
// Authorizations
// ----------------------------------------------------------------------------

export interface ListAuthorizationsRequest {
  organization_id: string
  resource_ids: string[]
}

export interface ListAuthorizationsResponse {
  authorizations: Authorization[]
}

export interface CheckPermissionsRequest {
  permissions: AuthorizedPermissions[]
}

export interface CheckPermissionsResponse {
  authorized_permissions: AuthorizedPermissions[]
}

// ----------------------------------------------------------------------------
// Fragments
// ----------------------------------------------------------------------------

export interface GetFragmentRequest {
  id: string
}

export interface GetFragmentResponse {
  fragment: Fragment | null
}
