import { UnknownPermissionError } from "../common/errors/index.js"
import type { Authorization } from "../grpc/types.js"

/**
 * Kinds of resource an authorization can be attached to
 */
export enum ResourceType {
  Organization = "organization",
  Location = "location",
  Robot = "robot",
}

/**
 * Actions checked by `AppClient.checkPermissions`. Values are the codes
 * used on the wire.
 */
export enum Permission {
  ReadOrganization = "read_organization",
  UpdateOrganization = "update_organization",
  DeleteOrganization = "delete_organization",
  ManageOrganizationMembers = "manage_organization_members",
  CreateLocation = "create_location",
  ReadLocation = "read_location",
  UpdateLocation = "update_location",
  DeleteLocation = "delete_location",
  CreateRobot = "create_robot",
  ReadRobot = "read_robot",
  UpdateRobot = "update_robot",
  DeleteRobot = "delete_robot",
  ReadRobotConfig = "read_robot_config",
  UpdateRobotConfig = "update_robot_config",
  ReadRobotLogs = "read_robot_logs",
  ReadFragment = "read_fragment",
  UpdateFragment = "update_fragment",
}

const PERMISSIONS_BY_CODE = new Map<string, Permission>(
  Object.values(Permission).map((permission) => [permission, permission]),
)

/**
 * Map a raw permission code returned by the service to {@link Permission}
 *
 * @throws UnknownPermissionError if the code is not part of the enumeration
 */
export function decodePermission(code: string): Permission {
  const permission = PERMISSIONS_BY_CODE.get(code)
  if (permission === undefined) {
    throw new UnknownPermissionError(`unknown permission code "${code}"`, {
      permission: code,
    })
  }
  return permission
}

export type AuthorizationRole = "owner" | "operator"

/**
 * Role grant attached to an organization invite
 *
 * @example
 * ```typescript
 * await client.createOrganizationInvite(org, "new.member@example.com", [
 *   OrganizationAuthorization.forLocation("operator", org.id, location.id),
 * ])
 * ```
 */
export class OrganizationAuthorization {
  readonly role: AuthorizationRole
  readonly resourceType: ResourceType
  readonly resourceId: string
  readonly organizationId: string

  constructor(
    role: AuthorizationRole,
    resourceType: ResourceType,
    resourceId: string,
    organizationId: string,
  ) {
    this.role = role
    this.resourceType = resourceType
    this.resourceId = resourceId
    this.organizationId = organizationId
  }

  static forOrganization(
    role: AuthorizationRole,
    organizationId: string,
  ): OrganizationAuthorization {
    return new OrganizationAuthorization(
      role,
      ResourceType.Organization,
      organizationId,
      organizationId,
    )
  }

  static forLocation(
    role: AuthorizationRole,
    organizationId: string,
    locationId: string,
  ): OrganizationAuthorization {
    return new OrganizationAuthorization(
      role,
      ResourceType.Location,
      locationId,
      organizationId,
    )
  }

  static forRobot(
    role: AuthorizationRole,
    organizationId: string,
    robotId: string,
  ): OrganizationAuthorization {
    return new OrganizationAuthorization(
      role,
      ResourceType.Robot,
      robotId,
      organizationId,
    )
  }

  /**
   * Wire form of the grant. The identity is filled in by the service
   * once the invite is accepted.
   */
  toMessage(): Authorization {
    return {
      authorization_type: "role",
      authorization_id: this.role,
      resource_type: this.resourceType,
      resource_id: this.resourceId,
      identity_id: "",
      organization_id: this.organizationId,
      identity_type: "",
    }
  }
}
