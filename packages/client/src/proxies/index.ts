export { CapabilityProxy } from "./capability-proxy.js"
export { ParameterProxy } from "./parameter-proxy.js"
export { ResultProxy } from "./result-proxy.js"
export { LogProxy } from "./log-proxy.js"
