/**
 * gRPC client infrastructure
 *
 * This module provides the App service client factory, connection
 * management and the broadcast wrapper for server streams.
 *
 * @module grpc
 */

export {
  createAppServiceClient,
  loadAppServiceConstructor,
  createAuthMetadata,
  callUnary,
  APP_SERVICE_NAME,
} from "./client.js"
export type {
  AppServiceClient,
  AppServiceMethods,
  UnaryMethod,
  ServerStreamMethod,
} from "./client.js"
export { GRPCConnectionManager } from "./connection.js"
export { BroadcastStream, StreamSubscription } from "./broadcast.js"
export type { BroadcastStreamOptions } from "./broadcast.js"
