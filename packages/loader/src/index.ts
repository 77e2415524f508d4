export { FsFileResolver } from "./adapters/fs/fs-file-resolver"
export { MemoryCatalog } from "./adapters/memory/memory-catalog"
export { buildDescriptors } from "./core/build-descriptors"
export {
  MemoryResourceCache,
  type MemoryResourceCacheDeps,
} from "./core/cache/memory-resource-cache"
export {
  createLocaleLoader,
  type LocaleLoader,
  type LocaleLoaderDeps,
  type LocaleLoaderExtras,
} from "./core/create-locale-loader"
export { LazyLoader, type LazyLoaderDeps, type LazyLoaderOptions } from "./core/lazy-loader"
export { mergeResources } from "./core/merge/merge-resources"
export {
  createResourceProducerFactory,
  type ResourceProducerDeps,
} from "./core/producer/create-resource-producer"
export type { ActivationResult, ActivationState } from "./ports/activation"
export type { CatalogConsumer } from "./ports/catalog-consumer"
export type { FileResolver } from "./ports/file-resolver"
export type { LocaleCode, LocaleDescriptor } from "./ports/locale"
export {
  isResourceMap,
  type MergedResource,
  type ResolvedResource,
  type ResourceMap,
  type ResourceValue,
} from "./ports/resource"
export type {
  CacheHit,
  CacheLookup,
  CacheMiss,
  CacheState,
  ResourceCache,
} from "./ports/resource-cache"
export type { ResourceProducer, ResourceProducerFactory } from "./ports/resource-producer"
export {
  describeRef,
  type FileResourceRef,
  fileRef,
  type InlineResourceRef,
  inlineRef,
  type ProducerContext,
  type ProducerFn,
  type RefOptions,
  type ResourceKey,
  type ResourceRef,
  type ResourceSource,
  refKey,
} from "./ports/resource-ref"
