import { type I18nOptions, resolveLocaleFiles } from "@lazyglot/config"
import type { LocaleDescriptor } from "../ports/locale"
import { fileRef } from "../ports/resource-ref"

/**
 * Turn validated options into descriptors whose sources are absolute file refs.
 */
export function buildDescriptors(options: I18nOptions): LocaleDescriptor[] {
  return resolveLocaleFiles(options).map(({ code, files }) => ({
    code,
    sources: files.map((file) => fileRef(file.path, { cache: file.cache })),
  }))
}
