/**
 * GrpcPlatformServer - serves cafe_sdk.proto from a PlatformDispatcher.
 *
 * Lets a run be exercised against a real gRPC channel without the platform:
 * the transport tests use it, and so can a script run on a workstation.
 */

import * as grpc from "@grpc/grpc-js"
import { ErrMalformedResponse } from "@cafesdk/core"
import type { PlatformDispatcher } from "../handlers/platform-dispatcher.js"
import { PlatformContract } from "./contract.js"
import { statusFromError } from "./grpc-status.js"
import { isRecord } from "../protocol/codec.js"
import { SERVICE_METHODS, ServiceName } from "../protocol/services.js"

export interface GrpcPlatformServerOptions {
  /** host:port to bind; port 0 picks a free one. Default 127.0.0.1:0 */
  readonly address?: string
  readonly contract?: PlatformContract
}

export class GrpcPlatformServer {
  private constructor(
    private readonly server: grpc.Server,
    /** The bound address, with the real port */
    readonly address: string,
  ) {}

  static async start(dispatcher: PlatformDispatcher, options: GrpcPlatformServerOptions = {}): Promise<GrpcPlatformServer> {
    const contract = options.contract ?? PlatformContract.load()
    const server = new grpc.Server()

    for (const name of ServiceName.all) {
      const implementation: grpc.UntypedServiceImplementation = {}
      for (const method of SERVICE_METHODS[name]) {
        implementation[method] = (call: grpc.ServerUnaryCall<object, object>, callback: grpc.sendUnaryData<object>) => {
          void dispatcher.call(name, method, call.request).then(
            (result) => {
              if (isRecord(result)) {
                callback(null, result)
              } else {
                callback(statusFromError(ErrMalformedResponse.create({ service: name, method, reason: "handler returned no message" })))
              }
            },
            (err: unknown) => callback(statusFromError(err)),
          )
        }
      }
      server.addService(contract.service(name), implementation)
    }

    const requested = options.address ?? "127.0.0.1:0"
    const port = await new Promise<number>((resolve, reject) => {
      server.bindAsync(requested, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
        if (error) reject(error)
        else resolve(boundPort)
      })
    })
    const host = requested.slice(0, requested.lastIndexOf(":"))
    return new GrpcPlatformServer(server, `${host}:${port}`)
  }

  /** Waits for in-flight calls, then releases the port. */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      this.server.tryShutdown((error) => {
        if (error) this.server.forceShutdown()
        resolve()
      })
    })
  }
}
