export { ParameterHandler } from "./parameter-handler.js"
export { ResultHandler } from "./result-handler.js"
export { LogHandler } from "./log-handler.js"
export { PlatformDispatcher } from "./platform-dispatcher.js"
