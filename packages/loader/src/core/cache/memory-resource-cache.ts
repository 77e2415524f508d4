import { type Logger, NullLogger } from "@lazyglot/logger"
import type { LocaleCode } from "../../ports/locale"
import type { ResolvedResource } from "../../ports/resource"
import type {
  CacheLookup,
  CacheState,
  ResourceCache,
} from "../../ports/resource-cache"
import type { ResourceProducerFactory } from "../../ports/resource-producer"
import { type ResourceKey, type ResourceRef, refKey } from "../../ports/resource-ref"

export type MemoryResourceCacheDeps = {
  producers: ResourceProducerFactory
  logger?: Logger
}

type PendingEntry = {
  state: "pending"
  label: string
  promise: Promise<ResolvedResource>
  followers: number
}

type ResolvedEntry = {
  state: "resolved"
  label: string
  value: ResolvedResource
}

type CacheEntry = PendingEntry | ResolvedEntry

export class MemoryResourceCache implements ResourceCache {
  private readonly entries = new Map<ResourceKey, CacheEntry>()
  private readonly logger: Logger

  constructor(private readonly deps: MemoryResourceCacheDeps) {
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "resource-cache" })
  }

  resolve(ref: ResourceRef, locale: LocaleCode): Promise<ResolvedResource> {
    const key = refKey(ref)
    const existing = this.entries.get(key)

    if (existing?.state === "resolved") {
      this.logger.trace("Resource cache hit", { source: existing.label, locale })
      return Promise.resolve(existing.value)
    }

    if (existing?.state === "pending") {
      existing.followers++
      this.logger.trace("Joining in-flight resolution", { source: existing.label, locale })
      return existing.promise
    }

    // The entry is stored before the producer runs: it is only invoked on a
    // later microtask, so any caller arriving in between joins this flight.
    const producer = this.deps.producers(ref)
    const promise = Promise.resolve()
      .then(() => producer.produce(locale))
      .then(
        (value) => {
          this.logger.debug("Resource resolved", {
            source: producer.label,
            locale,
            sharedWith: pending.followers,
          })

          if (this.entries.get(key) === pending) {
            if (producer.cacheable) {
              this.entries.set(key, { state: "resolved", label: producer.label, value })
            } else {
              this.entries.delete(key)
            }
          }
          return value
        },
        (err: unknown) => {
          if (this.entries.get(key) === pending) {
            this.entries.delete(key)
          }
          throw err
        },
      )

    const pending: PendingEntry = {
      state: "pending",
      label: producer.label,
      promise,
      followers: 0,
    }

    this.entries.set(key, pending)
    this.logger.debug("Resolving resource", { source: producer.label, locale })

    return promise
  }

  peek(ref: ResourceRef): CacheLookup<ResolvedResource> {
    const entry = this.entries.get(refKey(ref))

    return entry?.state === "resolved" ? { kind: "hit", value: entry.value } : { kind: "miss" }
  }

  state(ref: ResourceRef): CacheState | undefined {
    return this.entries.get(refKey(ref))?.state
  }

  get size(): number {
    return this.entries.size
  }
}
