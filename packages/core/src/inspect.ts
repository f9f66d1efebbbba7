import {formatWithOptions, type InspectOptions} from 'node:util'

/**
 * Assign a custom inspect renderer to a class prototype.
 * Call inside a `static {}` block: it assigns once to the prototype, not per instance.
 *
 * `fn` receives the instance as `self` and returns a format string with params,
 * rendered by `util.formatWithOptions` (%s, %O, %d, ...). `options.colors`
 * says whether ANSI output is wanted.
 *
 * ```typescript
 * class Column {
 *   static {
 *     Inspect(this, (self) => ({
 *       format: "Column( %s | %s )",
 *       params: [self.key, self.format],
 *     }));
 *   }
 * }
 * ```
 */
export function Inspect<T>(cls: { prototype: T }, fn: (self: T, options: InspectOptions) => { format: string; params: unknown[] }): void {
  Object.defineProperty(cls.prototype, inspect, {
    value: function (this: T, depth: number, options: InspectOptions): string {
      const opts: InspectOptions = { ...options, depth: (depth ?? 2) - 1 }
      const data = fn(this, opts)
      return formatWithOptions(opts, data.format, ...data.params)
    },
    writable: true,
    configurable: true,
  })
}

export const inspect: unique symbol = Symbol.for('nodejs.util.inspect.custom')
