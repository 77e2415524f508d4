import type { LocaleCode } from "./locale"
import type { ResolvedResource } from "./resource"
import type { ResourceRef } from "./resource-ref"

export type CacheState = "pending" | "resolved"

export type CacheHit<T> = {
  kind: "hit"
  value: T
}

export type CacheMiss = {
  kind: "miss"
}

export type CacheLookup<T> = CacheHit<T> | CacheMiss

/**
 * Resolved sources memoized by ref identity.
 *
 * @remarks
 * - A producer runs at most once per identity; concurrent callers share the
 *   in-flight resolution.
 * - Failed resolutions are not kept, so a later call starts fresh.
 * - Entries are never evicted.
 */
export interface ResourceCache {
  /**
   * Resolve `ref`, invoking its producer only on the first call for its identity.
   *
   * @param locale Passed to producer functions when the producer does run.
   */
  resolve(ref: ResourceRef, locale: LocaleCode): Promise<ResolvedResource>

  /** Read a resolved entry without invoking anything. Pending entries are misses. */
  peek(ref: ResourceRef): CacheLookup<ResolvedResource>

  state(ref: ResourceRef): CacheState | undefined

  readonly size: number
}
