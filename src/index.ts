// App service client
export { AppClient } from "./app/app_client.js"
export type {
  RobotPartLogPage,
  LogStream,
  GetLogsOptions,
  TailLogsOptions,
  ListAuthorizationsOptions,
} from "./app/app_client.js"
export {
  ResourceType,
  Permission,
  OrganizationAuthorization,
  decodePermission,
} from "./app/permissions.js"
export type { AuthorizationRole } from "./app/permissions.js"

// Message and entity types
export type * from "./grpc/types.js"

// gRPC plumbing
export * from "./common/grpc/index.js"

// Configuration documents
export { toStruct, fromStruct } from "./common/struct.js"
export type { JsonValue, JsonObject } from "./common/struct.js"

// Common errors
export * from "./common/errors/index.js"

// Logging
export { createLogger } from "./common/log.js"
export type { Logger } from "./common/log.js"

// Connection for library
export type { CallbackFct } from "./connect.js"
export { connect, resolveConnectOpts } from "./connect.js"
export type { ConnectOpts, ResolvedConnectOpts } from "./connectOpts.js"
