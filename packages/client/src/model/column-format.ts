import { StaticTypeCompanion, ErrInvalidChoice } from "@cafesdk/core"

const COLUMN_FORMATS = ["text", "integer", "boolean", "array", "object"] as const

/** How the platform renders a result column */
export type ColumnFormat = (typeof COLUMN_FORMATS)[number]

export const ColumnFormat = StaticTypeCompanion({
  all: COLUMN_FORMATS,

  is(value: unknown): value is ColumnFormat {
    const formats: readonly unknown[] = COLUMN_FORMATS
    return formats.includes(value)
  },

  parse(value: string): ColumnFormat {
    if (ColumnFormat.is(value)) return value
    throw ErrInvalidChoice.create({ kind: "column format", value, allowed: COLUMN_FORMATS })
  },
})
