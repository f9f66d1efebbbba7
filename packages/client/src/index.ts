/**
 * @cafesdk/client - RPC facade for the platform sidecar
 */

export { CafeClient } from "./cafe-client.js"
export { ClientConfig, DEFAULT_ADDRESS, DEFAULT_READY_TIMEOUT_MS, type ClientConfigOptions } from "./config.js"

// Data model
export * from "./model/index.js"

// Capabilities and services
export {
  PROTO_PACKAGE,
  ServiceName,
  ParameterMethod,
  ResultMethod,
  LogMethod,
  SERVICE_METHODS,
} from "./protocol/services.js"
export type {
  CallOptions,
  DataRow,
  ParameterCapability,
  ResultCapability,
  LogCapability,
  ParameterService,
  ResultService,
  LogService,
  PlatformServices,
} from "./protocol/services.js"

// Caller and platform sides
export * from "./proxies/index.js"
export * from "./handlers/index.js"
export { InMemoryPlatform } from "./platform/in-memory-platform.js"

// gRPC
export { PlatformContract, DEFAULT_PROTO_PATH } from "./grpc/contract.js"
export { GrpcTransport } from "./grpc/grpc-transport.js"
export { GrpcPlatformServer, type GrpcPlatformServerOptions } from "./grpc/grpc-platform-server.js"
export { errorFromStatus, statusFromError } from "./grpc/grpc-status.js"

// Errors
export {
  Client,
  ErrConnectFailed,
  ErrContractLoadFailed,
  ErrInvalidConfig,
  ErrInvalidHeaderItem,
  ErrUnencodableRow,
  ErrInvalidInputJson,
  Platform,
  ErrInvalidRow,
  ErrUndeclaredColumn,
  ErrDuplicateColumn,
} from "./errors.js"
