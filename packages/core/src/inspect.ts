import util, {type InspectOptions} from 'node-inspect-extracted'

/**
 * Assign a custom inspect renderer to a class prototype.
 * Call inside a `static {}` block. Assigns once to the prototype, not per instance.
 *
 * The `fn` receives the instance as `self` and returns a format string with params.
 * Format specifiers (%s, %O, %d, etc.) are handled by `util.formatWithOptions`,
 * which provides colored output, depth-aware object rendering, etc.
 *
 * ```typescript
 * class Lexer {
 *   static {
 *     Inspect(this, (self) => ({
 *       format: "Lexer( %s )",
 *       params: [self.source],
 *     }));
 *   }
 * }
 * ```
 */
export function Inspect<T>(cls: { prototype: T }, fn: (self: T, options: InspectOptions) => { format: string; params: unknown[] }): void {
  Object.defineProperty(cls.prototype, inspect, {
    configurable: true,
    writable: true,
    value: function (this: T, depth: number, options: InspectOptions) {
      const opts = { ...options, depth: (depth ?? 2) - 1 }
      const data = fn(this, opts)
      return util.formatWithOptions(opts, data.format, ...data.params)
    },
  })
}

export const inspect: unique symbol = Symbol.for('nodejs.util.inspect.custom')
