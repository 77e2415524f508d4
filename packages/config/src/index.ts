export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config, type ConfigSnapshot } from "./core/config"
export { type LoadConfigOptions, loadConfig, loadI18nConfig } from "./core/load"
export {
  type ResolvedLocaleFile,
  type ResolvedLocaleFiles,
  resolveLocaleFiles,
} from "./core/locale-files"
export { type ResourceFormat, resourceFormatOf } from "./core/resource-format"
export {
  type I18nOptions,
  type I18nOptionsInput,
  i18nOptionsSchema,
  type LocaleEntry,
  type LocaleFile,
  localeEntrySchema,
  localeFileSchema,
} from "./core/schema"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
