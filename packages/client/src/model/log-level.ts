import { StaticTypeCompanion } from "@cafesdk/core"

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const LogLevel = StaticTypeCompanion({
  all: LOG_LEVELS,

  is(value: unknown): value is LogLevel {
    const levels: readonly unknown[] = LOG_LEVELS
    return levels.includes(value)
  },
})

/** One line for the platform's run log */
export interface LogEntry {
  readonly level: LogLevel
  readonly text: string
}
