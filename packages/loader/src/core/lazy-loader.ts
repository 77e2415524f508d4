import { ConfigValidationError, UnknownLocaleError } from "@lazyglot/errors"
import { type Logger, NullLogger } from "@lazyglot/logger"
import type { ActivationResult, ActivationState } from "../ports/activation"
import type { CatalogConsumer } from "../ports/catalog-consumer"
import type { LocaleCode, LocaleDescriptor } from "../ports/locale"
import type { MergedResource, ResolvedResource } from "../ports/resource"
import type { ResourceCache } from "../ports/resource-cache"
import { mergeResources } from "./merge/merge-resources"

export type LazyLoaderDeps = {
  cache: ResourceCache
  catalog: CatalogConsumer
  logger?: Logger
}

export type LazyLoaderOptions = {
  descriptors: readonly LocaleDescriptor[]

  /**
   * `false` resolves every locale's sources in init().
   * @default true
   */
  lazy?: boolean

  /** Locale activated by init() */
  defaultLocale?: LocaleCode

  /**
   * Skip delivery of an activation that finishes after a newer one was
   * requested. `false` lets the last activation to finish win.
   * @default true
   */
  discardStaleActivations?: boolean
}

/**
 * Activates locales on demand: resolves each declared source through the
 * cache in order, merges them and hands the result to the catalog.
 *
 * Activation is all-or-nothing. A failure leaves the previously active
 * locale installed and selectable.
 */
export class LazyLoader {
  private readonly descriptors: ReadonlyMap<LocaleCode, LocaleDescriptor>
  private readonly states = new Map<LocaleCode, ActivationState>()
  private readonly loaded = new Set<LocaleCode>()
  private readonly logger: Logger
  private sequence = 0
  private active: LocaleCode | undefined
  private deliveries: Promise<void> = Promise.resolve()

  constructor(
    private readonly deps: LazyLoaderDeps,
    private readonly opts: LazyLoaderOptions,
  ) {
    this.descriptors = indexDescriptors(opts.descriptors)
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "lazy-loader" })

    if (opts.defaultLocale !== undefined && !this.descriptors.has(opts.defaultLocale)) {
      throw new ConfigValidationError(
        `defaultLocale '${opts.defaultLocale}' is not a declared locale`,
      )
    }
  }

  get activeLocale(): LocaleCode | undefined {
    return this.active
  }

  locales(): LocaleCode[] {
    return [...this.descriptors.keys()]
  }

  hasLocale(code: LocaleCode): boolean {
    return this.descriptors.has(code)
  }

  /**
   * State of the most recent activation of `code`; undefined for undeclared locales.
   */
  status(code: LocaleCode): ActivationState | undefined {
    if (!this.descriptors.has(code)) return undefined
    return this.states.get(code) ?? "idle"
  }

  /**
   * Whether `code` has been installed in the catalog, or had its sources
   * resolved by preload().
   */
  isLoaded(code: LocaleCode): boolean {
    return this.loaded.has(code)
  }

  loadedLocales(): LocaleCode[] {
    return [...this.loaded]
  }

  /**
   * Eager mode resolves every locale up front; then the default locale, if
   * any, is activated.
   */
  async init(): Promise<ActivationResult | undefined> {
    if (this.opts.lazy === false) {
      await this.preload()
    }

    if (this.opts.defaultLocale === undefined) return undefined

    return this.activate(this.opts.defaultLocale)
  }

  async activate(code: LocaleCode): Promise<ActivationResult> {
    const descriptor = this.describe(code)
    const activation = ++this.sequence
    const log = this.logger.child({ locale: code, activation })

    this.transition(code, "resolving", log)

    let resources: ResolvedResource[]
    try {
      resources = await this.resolveSources(descriptor)
    } catch (err) {
      this.transition(code, "failed", log)
      log.warn("Locale activation failed", { err })
      throw err
    }

    this.transition(code, "merging", log)

    const resource = mergeResources(resources)

    let installed: boolean
    try {
      installed = await this.deliver(code, activation, resource)
    } catch (err) {
      this.transition(code, "failed", log)
      log.warn("Catalog rejected locale", { err })
      throw err
    }

    if (!installed) {
      this.transition(code, "superseded", log)
      log.debug("Skipping delivery of superseded activation", { latest: this.sequence })
      return { locale: code, activation, resource, delivered: false }
    }

    // The catalog now holds this locale; a newer activation still queued
    // behind this install replaces it when its own install runs.
    this.active = code
    this.loaded.add(code)

    if (this.isStale(activation)) {
      this.transition(code, "superseded", log)
      log.debug("Installed while a newer activation was pending", { latest: this.sequence })
      return { locale: code, activation, resource, delivered: true }
    }

    this.transition(code, "ready", log)
    log.info("Locale activated", { sources: descriptor.sources.length })

    return { locale: code, activation, resource, delivered: true }
  }

  /**
   * Resolve sources without installing anything, so later activations only
   * hit the cache. Defaults to every declared locale.
   *
   * Locales resolve concurrently; sources within one locale keep their order.
   */
  async preload(codes: readonly LocaleCode[] = this.locales()): Promise<void> {
    const descriptors = codes.map((code) => this.describe(code))

    await Promise.all(
      descriptors.map(async (descriptor) => {
        await this.resolveSources(descriptor)
        this.loaded.add(descriptor.code)
      }),
    )

    this.logger.debug("Preloaded locales", { locales: [...codes] })
  }

  private describe(code: LocaleCode): LocaleDescriptor {
    const descriptor = this.descriptors.get(code)

    if (!descriptor) {
      this.logger.warn("Unknown locale requested", { locale: code })
      throw new UnknownLocaleError(code, this.locales())
    }

    return descriptor
  }

  private async resolveSources(descriptor: LocaleDescriptor): Promise<ResolvedResource[]> {
    const resources: ResolvedResource[] = []

    for (const ref of descriptor.sources) {
      resources.push(await this.deps.cache.resolve(ref, descriptor.code))
    }

    return resources
  }

  /**
   * Installs run one at a time in the order activations reach delivery. An
   * activation that is stale by its turn is not installed.
   */
  private deliver(
    code: LocaleCode,
    activation: number,
    resource: MergedResource,
  ): Promise<boolean> {
    const delivery = this.deliveries.then(async () => {
      if (this.isStale(activation)) return false

      await this.deps.catalog.install(code, resource)
      return true
    })

    // Only orders the queue; the outcome reaches the caller through `delivery`.
    this.deliveries = delivery.then(
      () => undefined,
      () => undefined,
    )

    return delivery
  }

  private isStale(activation: number): boolean {
    return (this.opts.discardStaleActivations ?? true) && activation !== this.sequence
  }

  private transition(code: LocaleCode, to: ActivationState, log: Logger): void {
    const from = this.states.get(code) ?? "idle"
    this.states.set(code, to)
    log.debug("Locale state changed", { from, to })
  }
}

function indexDescriptors(
  descriptors: readonly LocaleDescriptor[],
): ReadonlyMap<LocaleCode, LocaleDescriptor> {
  const index = new Map<LocaleCode, LocaleDescriptor>()

  for (const descriptor of descriptors) {
    if (index.has(descriptor.code)) {
      throw new ConfigValidationError(`Locale '${descriptor.code}' is declared more than once`)
    }
    if (descriptor.sources.length === 0) {
      throw new ConfigValidationError(`Locale '${descriptor.code}' declares no resource sources`)
    }
    index.set(descriptor.code, descriptor)
  }

  return index
}
