import { StaticTypeCompanion, Inspect } from "@cafesdk/core"
import { ColumnFormat } from "./column-format.js"
import { ErrInvalidHeaderItem } from "../errors.js"

/**
 * One column of the run's result table.
 *
 * `key` is the field name rows use; `label` is what the platform shows.
 * Key uniqueness across a header is checked by the platform, not here.
 */
export interface TableHeaderItem {
  readonly label: string
  readonly key: string
  readonly format: ColumnFormat
}

/** Ordered column schema of the result table */
export type TableHeader = readonly TableHeaderItem[]

export interface TableHeaderItemInput {
  readonly label: string
  readonly key: string
  readonly format: string
}

class Column implements TableHeaderItem {
  static {
    Inspect(this, (self) => ({
      format: "Column( %s | %s | %s )",
      params: [self.key, self.format, self.label],
    }))
  }

  constructor(
    readonly label: string,
    readonly key: string,
    readonly format: ColumnFormat,
  ) {
    Object.freeze(this)
  }
}

export const TableHeaderItem = StaticTypeCompanion({
  /** Validates the key and format, so bad columns fail here rather than at the peer */
  create(input: TableHeaderItemInput): TableHeaderItem {
    if (input.key.trim() === "") {
      throw ErrInvalidHeaderItem.create({ key: input.key, reason: "key must not be empty" })
    }
    if (!ColumnFormat.is(input.format)) {
      throw ErrInvalidHeaderItem.create({
        key: input.key,
        reason: `format must be one of ${ColumnFormat.all.join(", ")}, got "${input.format}"`,
      })
    }
    return new Column(input.label, input.key, input.format)
  },

  /** A text column; the label defaults to the key */
  text(key: string, label: string = key): TableHeaderItem {
    return TableHeaderItem.create({ key, label, format: "text" })
  },
})
