import * as grpc from "@grpc/grpc-js"
import * as protoLoader from "@grpc/proto-loader"
import * as fs from "fs"
import * as path from "path"
import { fileURLToPath } from "url"

import type {
  ListOrganizationsRequest,
  ListOrganizationsResponse,
  GetOrganizationRequest,
  GetOrganizationResponse,
  ListOrganizationMembersRequest,
  ListOrganizationMembersResponse,
  CreateOrganizationInviteRequest,
  CreateOrganizationInviteResponse,
  ResendOrganizationInviteRequest,
  ResendOrganizationInviteResponse,
  DeleteOrganizationInviteRequest,
  DeleteOrganizationInviteResponse,
  DeleteOrganizationMemberRequest,
  DeleteOrganizationMemberResponse,
  ListLocationsRequest,
  ListLocationsResponse,
  GetLocationRequest,
  GetLocationResponse,
  ListRobotsRequest,
  ListRobotsResponse,
  GetRobotRequest,
  GetRobotResponse,
  NewRobotRequest,
  NewRobotResponse,
  GetRobotPartsRequest,
  GetRobotPartsResponse,
  GetRobotPartRequest,
  GetRobotPartResponse,
  UpdateRobotPartRequest,
  UpdateRobotPartResponse,
  GetRobotPartLogsRequest,
  GetRobotPartLogsResponse,
  TailRobotPartLogsRequest,
  TailRobotPartLogsResponse,
  ListAuthorizationsRequest,
  ListAuthorizationsResponse,
  CheckPermissionsRequest,
  CheckPermissionsResponse,
  GetFragmentRequest,
  GetFragmentResponse,
} from "../../grpc/types.js"

export const APP_SERVICE_NAME = "fleet.app.v1.AppService"

/**
 * Callback-style unary method, as generated by grpc-js
 */
export type UnaryMethod<TRequest, TResponse> = (
  request: TRequest,
  metadata: grpc.Metadata,
  callback: (error: grpc.ServiceError | null, response?: TResponse) => void,
) => grpc.ClientUnaryCall

/**
 * Server-streaming method, as generated by grpc-js
 */
export type ServerStreamMethod<TRequest, TResponse> = (
  request: TRequest,
  metadata: grpc.Metadata,
) => grpc.ClientReadableStream<TResponse>

/**
 * RPC methods of the App service
 *
 * Each method corresponds to a gRPC RPC defined in app.proto. This is the
 * only surface the {@link AppClient} relies on, so any implementation
 * (e.g. an in-process fake) can stand in for the network client.
 */
export type AppServiceMethods = {
  ListOrganizations: UnaryMethod<ListOrganizationsRequest, ListOrganizationsResponse>
  GetOrganization: UnaryMethod<GetOrganizationRequest, GetOrganizationResponse>
  ListOrganizationMembers: UnaryMethod<
    ListOrganizationMembersRequest,
    ListOrganizationMembersResponse
  >
  CreateOrganizationInvite: UnaryMethod<
    CreateOrganizationInviteRequest,
    CreateOrganizationInviteResponse
  >
  ResendOrganizationInvite: UnaryMethod<
    ResendOrganizationInviteRequest,
    ResendOrganizationInviteResponse
  >
  DeleteOrganizationInvite: UnaryMethod<
    DeleteOrganizationInviteRequest,
    DeleteOrganizationInviteResponse
  >
  DeleteOrganizationMember: UnaryMethod<
    DeleteOrganizationMemberRequest,
    DeleteOrganizationMemberResponse
  >

  ListLocations: UnaryMethod<ListLocationsRequest, ListLocationsResponse>
  GetLocation: UnaryMethod<GetLocationRequest, GetLocationResponse>

  ListRobots: UnaryMethod<ListRobotsRequest, ListRobotsResponse>
  GetRobot: UnaryMethod<GetRobotRequest, GetRobotResponse>
  NewRobot: UnaryMethod<NewRobotRequest, NewRobotResponse>

  GetRobotParts: UnaryMethod<GetRobotPartsRequest, GetRobotPartsResponse>
  GetRobotPart: UnaryMethod<GetRobotPartRequest, GetRobotPartResponse>
  UpdateRobotPart: UnaryMethod<UpdateRobotPartRequest, UpdateRobotPartResponse>
  GetRobotPartLogs: UnaryMethod<GetRobotPartLogsRequest, GetRobotPartLogsResponse>

  /**
   * Push new log batches for a part until cancelled
   */
  TailRobotPartLogs: ServerStreamMethod<
    TailRobotPartLogsRequest,
    TailRobotPartLogsResponse
  >

  ListAuthorizations: UnaryMethod<ListAuthorizationsRequest, ListAuthorizationsResponse>
  CheckPermissions: UnaryMethod<CheckPermissionsRequest, CheckPermissionsResponse>

  GetFragment: UnaryMethod<GetFragmentRequest, GetFragmentResponse>
}

/**
 * gRPC client for the App service: the RPC methods plus the grpc-js
 * channel methods (`close`, `waitForReady`, ...)
 */
export type AppServiceClient = grpc.Client & AppServiceMethods

const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
}

/**
 * Locate app.proto. Sources live in src/common/grpc, compiled output one
 * level deeper in dist/src/common/grpc.
 */
function resolveProtoPath(): string {
  const currentDir = path.dirname(fileURLToPath(import.meta.url))
  const candidates = [
    path.join(currentDir, "../../../proto/app.proto"),
    path.join(currentDir, "../../../../proto/app.proto"),
  ]

  const found = candidates.find((candidate) => fs.existsSync(candidate))
  if (!found) {
    throw new Error(
      `app.proto not found. Tried paths:\n${candidates.map((p) => `  - ${p}`).join("\n")}`,
    )
  }
  return found
}

/**
 * Load proto definitions and create the App service client constructor
 */
export function loadAppServiceConstructor(): grpc.ServiceClientConstructor {
  const packageDefinition = protoLoader.loadSync(
    resolveProtoPath(),
    PROTO_LOADER_OPTIONS,
  )

  const definition = packageDefinition[APP_SERVICE_NAME]
  if (!definition || "format" in definition) {
    throw new Error(`${APP_SERVICE_NAME} is not a service in app.proto`)
  }

  return grpc.makeGenericClientConstructor(definition, "AppService")
}

/**
 * Create a gRPC client for the App service
 *
 * Creates a client for the App service by loading the proto file and
 * opening a channel to the given address. The channel connects lazily,
 * on the first call.
 *
 * @param address - `host:port` of the service
 * @param insecure - Use a plaintext channel instead of TLS
 * @returns An AppServiceClient instance
 */
export function createAppServiceClient(
  address: string,
  insecure = false,
): AppServiceClient {
  const AppService = loadAppServiceConstructor()
  const credentials = insecure
    ? grpc.credentials.createInsecure()
    : grpc.credentials.createSsl()

  // Methods are attached by makeGenericClientConstructor from app.proto
  return new AppService(address, credentials) as AppServiceClient
}

/**
 * Create metadata with authentication
 *
 * Generates gRPC metadata carrying the access token as a Bearer
 * authorization header.
 *
 * @param token - Access token for the App service
 * @returns gRPC Metadata with Authorization header
 */
export function createAuthMetadata(token: string): grpc.Metadata {
  const metadata = new grpc.Metadata()
  metadata.add("authorization", `Bearer ${token}`)
  return metadata
}

/**
 * Helper to promisify unary gRPC calls
 *
 * Converts callback-based unary gRPC methods to Promise-based API
 * for easier use with async/await. Errors are rejected as received.
 *
 * @param method - The gRPC method to call
 * @param request - The request object
 * @param metadata - gRPC metadata (auth, etc.)
 * @returns Promise that resolves with the response
 */
export function callUnary<TRequest, TResponse>(
  method: UnaryMethod<TRequest, TResponse>,
  request: TRequest,
  metadata: grpc.Metadata,
): Promise<TResponse> {
  return new Promise((resolve, reject) => {
    method(request, metadata, (error, response) => {
      if (error) {
        reject(error)
      } else if (response === undefined) {
        reject(new Error("unary call completed without a response"))
      } else {
        resolve(response)
      }
    })
  })
}
