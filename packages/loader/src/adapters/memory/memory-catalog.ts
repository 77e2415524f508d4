import type { CatalogConsumer } from "../../ports/catalog-consumer"
import type { LocaleCode } from "../../ports/locale"
import type { MergedResource } from "../../ports/resource"

/**
 * Keeps installed catalogs in memory; the last installed locale is active.
 */
export class MemoryCatalog implements CatalogConsumer {
  private readonly catalogs = new Map<LocaleCode, MergedResource>()
  private current: LocaleCode | undefined

  install(locale: LocaleCode, resource: MergedResource): void {
    this.catalogs.set(locale, resource)
    this.current = locale
  }

  get activeLocale(): LocaleCode | undefined {
    return this.current
  }

  get active(): MergedResource | undefined {
    return this.current === undefined ? undefined : this.catalogs.get(this.current)
  }

  catalog(locale: LocaleCode): MergedResource | undefined {
    return this.catalogs.get(locale)
  }

  installed(): LocaleCode[] {
    return [...this.catalogs.keys()]
  }
}
