/**
 * Validated configuration plus provenance of each top-level key.
 *
 * @example
 * ```ts
 * const config = await loadI18nConfig({
 *   sources: [
 *     new JsonSource({ file: "i18n.config.json", required: true }),
 *     new ObjectSource({ lazy: true }),
 *   ],
 * })
 *
 * config.value.lazy       // true
 * config.explain("lazy")  // "object:overrides"
 * config.explain("langDir") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that provided the final value for a key, or "default"
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys present in sources but not defined in the schema (typos, stale options). */
  unknownKeys(): string[]
}
