export { ColumnFormat } from "./column-format.js"
export { LogLevel, type LogEntry } from "./log-level.js"
export { TableHeaderItem, type TableHeader, type TableHeaderItemInput } from "./table-header.js"
export { PlatformResponse } from "./platform-response.js"
