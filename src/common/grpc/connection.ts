import type * as grpc from "@grpc/grpc-js"

import type { AppServiceClient } from "./client.js"
import { createAppServiceClient, createAuthMetadata } from "./client.js"

/**
 * Manages gRPC connection lifecycle
 *
 * This class handles lazy initialization of the App service client and
 * provides methods to get the client and authentication metadata. The
 * client is created only when first accessed.
 *
 * @example
 * ```typescript
 * const manager = new GRPCConnectionManager("app.example.com:443", "token")
 * const client = manager.getClient()
 * const metadata = manager.getMetadata()
 * // ... use client ...
 * manager.close()
 * ```
 */
export class GRPCConnectionManager {
  private client: AppServiceClient | null = null
  private metadata: grpc.Metadata | null = null
  private address: string
  private token: string
  private insecure: boolean

  /**
   * Create a new GRPCConnectionManager
   *
   * @param address - `host:port` of the App service
   * @param token - Access token for authentication
   * @param insecure - Use a plaintext channel instead of TLS
   */
  constructor(address: string, token: string, insecure = false) {
    this.address = address
    this.token = token
    this.insecure = insecure
  }

  /**
   * Get or create the App service client (lazy initialization)
   *
   * The client is created on first access and reused for subsequent calls,
   * so every operation shares one channel.
   */
  getClient(): AppServiceClient {
    if (!this.client) {
      this.client = createAppServiceClient(this.address, this.insecure)
    }
    return this.client
  }

  /**
   * Get authentication metadata
   *
   * Returns metadata with the Bearer authorization header. The metadata is
   * created once and reused.
   */
  getMetadata(): grpc.Metadata {
    if (!this.metadata) {
      this.metadata = createAuthMetadata(this.token)
    }
    return this.metadata
  }

  /**
   * Close the gRPC connection
   *
   * Closes the channel. Open calls, including log tails, are cancelled.
   */
  close(): void {
    if (this.client) {
      this.client.close()
      this.client = null
      this.metadata = null
    }
  }
}
