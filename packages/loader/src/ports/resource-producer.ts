import type { LocaleCode } from "./locale"
import type { ResolvedResource } from "./resource"
import type { ResourceKey, ResourceRef } from "./resource-ref"

/**
 * One uniform capability over every source shape: a request that yields a
 * resource object, now or later.
 */
export interface ResourceProducer {
  readonly key: ResourceKey
  readonly label: string
  readonly cacheable: boolean

  /**
   * Rejects with MalformedResourceError when the source yields a non-object.
   */
  produce(locale: LocaleCode): Promise<ResolvedResource>
}

export type ResourceProducerFactory = (ref: ResourceRef) => ResourceProducer
