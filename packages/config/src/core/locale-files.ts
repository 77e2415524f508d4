import path from "node:path"
import type { I18nOptions, LocaleEntry } from "./schema"

export type ResolvedLocaleFile = Readonly<{
  /** Absolute location of the resource file */
  path: string
  cache: boolean
}>

export type ResolvedLocaleFiles = Readonly<{
  code: string
  files: readonly ResolvedLocaleFile[]
}>

/**
 * Expand each locale's `file`/`files` into absolute paths under
 * `rootDir/langDir`, keeping declaration order.
 */
export function resolveLocaleFiles(options: I18nOptions): ResolvedLocaleFiles[] {
  const baseDir = path.resolve(options.rootDir, options.langDir)

  return options.locales.map((locale) => ({
    code: locale.code,
    files: entryFiles(locale).map((entry) =>
      typeof entry === "string"
        ? { path: path.resolve(baseDir, entry), cache: true }
        : { path: path.resolve(baseDir, entry.path), cache: entry.cache },
    ),
  }))
}

function entryFiles(locale: LocaleEntry) {
  if (locale.files !== undefined) return locale.files
  return locale.file === undefined ? [] : [locale.file]
}
