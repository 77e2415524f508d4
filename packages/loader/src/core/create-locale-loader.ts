import type { I18nOptions } from "@lazyglot/config"
import { type Logger, NullLogger } from "@lazyglot/logger"
import { FsFileResolver } from "../adapters/fs/fs-file-resolver"
import { MemoryCatalog } from "../adapters/memory/memory-catalog"
import type { CatalogConsumer } from "../ports/catalog-consumer"
import type { FileResolver } from "../ports/file-resolver"
import type { LocaleDescriptor } from "../ports/locale"
import type { ProducerContext } from "../ports/resource-ref"
import { buildDescriptors } from "./build-descriptors"
import { MemoryResourceCache } from "./cache/memory-resource-cache"
import { LazyLoader } from "./lazy-loader"
import { createResourceProducerFactory } from "./producer/create-resource-producer"

export type LocaleLoaderDeps = {
  logger?: Logger
  catalog?: CatalogConsumer
  files?: FileResolver
  context?: ProducerContext
}

export type LocaleLoaderExtras = {
  /**
   * Descriptors declared in code (inline producers), added after the
   * configured locales.
   */
  descriptors?: readonly LocaleDescriptor[]
}

export type LocaleLoader = {
  loader: LazyLoader
  cache: MemoryResourceCache
  catalog: CatalogConsumer
}

/**
 * Wire validated i18n options into a ready-to-use loader.
 *
 * @example
 * ```ts
 * const config = await loadI18nConfig({
 *   sources: [new JsonSource({ file: "i18n.config.json", required: true })],
 * })
 * const { loader } = createLocaleLoader(config.value, { logger })
 *
 * await loader.init()
 * await loader.activate("es-AR")
 * ```
 */
export function createLocaleLoader(
  options: I18nOptions,
  deps: LocaleLoaderDeps = {},
  extras: LocaleLoaderExtras = {},
): LocaleLoader {
  const logger = deps.logger ?? new NullLogger()
  const catalog = deps.catalog ?? new MemoryCatalog()

  const producers = createResourceProducerFactory({
    files: deps.files ?? new FsFileResolver(),
    context: deps.context,
  })
  const cache = new MemoryResourceCache({ producers, logger })

  const loader = new LazyLoader(
    { cache, catalog, logger },
    {
      descriptors: [...buildDescriptors(options), ...(extras.descriptors ?? [])],
      lazy: options.lazy,
      defaultLocale: options.defaultLocale,
      discardStaleActivations: options.discardStaleActivations,
    },
  )

  return { loader, cache, catalog }
}
