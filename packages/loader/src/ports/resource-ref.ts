import type { LocaleCode } from "./locale"
import type { ResolvedResource } from "./resource"

/**
 * Opaque value handed to every producer function, e.g. a fetch wrapper or
 * request-scoped settings.
 */
export type ProducerContext = Readonly<Record<string, unknown>>

/**
 * User-supplied producer. Returning anything but an object, now or later,
 * fails the activation with a MalformedResourceError.
 */
export type ProducerFn = (
  context: ProducerContext,
  locale: LocaleCode,
) => ResolvedResource | PromiseLike<ResolvedResource>

export type ResourceSource = ResolvedResource | ProducerFn

export type FileResourceRef = Readonly<{
  kind: "file"
  /** Absolute path; also the cache identity */
  path: string
  cache: boolean
}>

export type InlineResourceRef = Readonly<{
  kind: "inline"
  /** Cache identity is this object or function reference, never its output */
  source: ResourceSource
  cache: boolean
}>

export type ResourceRef = FileResourceRef | InlineResourceRef

/**
 * Identity under which a resolved source is cached.
 */
export type ResourceKey = string | ResourceSource

export type RefOptions = {
  /**
   * `false` resolves the source again on every activation.
   * @default true
   */
  cache?: boolean
}

export function fileRef(path: string, options: RefOptions = {}): FileResourceRef {
  return { kind: "file", path, cache: options.cache ?? true }
}

export function inlineRef(source: ResourceSource, options: RefOptions = {}): InlineResourceRef {
  return { kind: "inline", source, cache: options.cache ?? true }
}

export function refKey(ref: ResourceRef): ResourceKey {
  return ref.kind === "file" ? ref.path : ref.source
}

/**
 * Human-readable name of a source for logs and error messages.
 */
export function describeRef(ref: ResourceRef): string {
  if (ref.kind === "file") return ref.path
  if (typeof ref.source === "function") return `inline:${ref.source.name || "anonymous"}`
  return "inline:object"
}
