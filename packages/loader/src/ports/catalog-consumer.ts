import type { LocaleCode } from "./locale"
import type { MergedResource } from "./resource"

/**
 * Makes a merged resource the active translation source for lookups.
 */
export interface CatalogConsumer {
  install(locale: LocaleCode, resource: MergedResource): void | Promise<void>
}
