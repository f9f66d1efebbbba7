/**
 * PlatformContract - cafe_sdk.proto, loaded at runtime with proto-loader.
 *
 * Field names keep their proto spelling (json_string, not jsonString), so the
 * messages carried by gRPC have the same shape as the ones the loopback
 * carries.
 */

import { fileURLToPath } from "node:url"
import * as protoLoader from "@grpc/proto-loader"
import { ErrUnknownMethod, ErrUnknownService } from "@cafesdk/core"
import { PROTO_PACKAGE, ServiceName } from "../protocol/services.js"
import { ErrContractLoadFailed } from "../errors.js"

export const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
}

/** The contract shipped with this package */
export const DEFAULT_PROTO_PATH = fileURLToPath(new URL("../../proto/cafe_sdk.proto", import.meta.url))

export class PlatformContract {
  private constructor(
    readonly protoPath: string,
    private readonly services: ReadonlyMap<ServiceName, protoLoader.ServiceDefinition>,
  ) {}

  static load(protoPath: string = DEFAULT_PROTO_PATH): PlatformContract {
    const definition = ErrContractLoadFailed.wrap({ protoPath }, () => protoLoader.loadSync(protoPath, LOADER_OPTIONS))

    const services = new Map<ServiceName, protoLoader.ServiceDefinition>()
    for (const name of ServiceName.all) {
      const def = definition[`${PROTO_PACKAGE}.${name}`]
      if (def === undefined || "format" in def) {
        throw ErrContractLoadFailed.create({ protoPath }, `service ${PROTO_PACKAGE}.${name} is not defined`)
      }
      services.set(name, def)
    }
    return new PlatformContract(protoPath, services)
  }

  service(name: ServiceName): protoLoader.ServiceDefinition {
    const def = this.services.get(name)
    if (def === undefined) throw ErrUnknownService.create({ service: name })
    return def
  }

  method(service: string, method: string): protoLoader.MethodDefinition<object, object> {
    if (!ServiceName.is(service)) throw ErrUnknownService.create({ service })
    const def = this.service(service)[method]
    if (def === undefined) throw ErrUnknownMethod.create({ service, method })
    return def
  }
}
