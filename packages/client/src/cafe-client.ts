/**
 * CafeClient - the facade a run holds: one connection to the platform and
 * the three capabilities over it.
 *
 * Built once by the entry point and passed to whatever needs it:
 *
 * ```typescript
 * const client = await CafeClient.connect()
 * await client.result.setTableHeader([TableHeaderItem.text("title")])
 * await client.result.pushData({ title: "hello" })
 * await client.close()
 * ```
 */

import type { Transport } from "@cafesdk/core"
import { ParameterProxy } from "./proxies/parameter-proxy.js"
import { ResultProxy } from "./proxies/result-proxy.js"
import { LogProxy } from "./proxies/log-proxy.js"
import type { LogCapability, ParameterCapability, ResultCapability } from "./protocol/services.js"
import { PlatformContract } from "./grpc/contract.js"
import { GrpcTransport } from "./grpc/grpc-transport.js"
import { ClientConfig, type ClientConfigOptions } from "./config.js"

export class CafeClient {
  readonly parameter: ParameterCapability
  readonly result: ResultCapability
  readonly log: LogCapability

  constructor(private readonly transport: Transport) {
    this.parameter = new ParameterProxy(transport)
    this.result = new ResultProxy(transport)
    this.log = new LogProxy(transport)
  }

  /**
   * Connects to the platform over gRPC.
   *
   * Rejects with ErrContractLoadFailed when the proto cannot be loaded, and
   * with ErrConnectFailed when the peer is not ready within the timeout.
   * No client exists after a failure; the channel is already closed.
   */
  static async connect(config: ClientConfig | ClientConfigOptions = {}): Promise<CafeClient> {
    const resolved = config instanceof ClientConfig ? config : new ClientConfig(config)
    const contract = PlatformContract.load(resolved.protoPath)
    const transport = GrpcTransport.create(resolved.address, contract)
    if (resolved.waitForReady) {
      try {
        await transport.waitForReady(resolved.readyTimeoutMs)
      } catch (err) {
        await transport.close()
        throw err
      }
    }
    return new CafeClient(transport)
  }

  /** Later calls reject with ErrTransportClosed. */
  close(): Promise<void> {
    return this.transport.close()
  }
}
