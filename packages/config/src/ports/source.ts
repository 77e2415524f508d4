/**
 * A source of raw i18n configuration.
 *
 * A ConfigSource only *loads* values. Validation and defaults belong to the
 * schema. Sources are applied in order and later sources replace top-level
 * keys set by earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance, e.g. "json:i18n.config.json".
   */
  readonly name: string

  /**
   * Load configuration values. A key set to undefined means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
