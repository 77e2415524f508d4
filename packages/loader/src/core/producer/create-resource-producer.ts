import {
  describeValue,
  MalformedResourceError,
  ProducerRejectionError,
} from "@lazyglot/errors"
import type { FileResolver } from "../../ports/file-resolver"
import type { LocaleCode } from "../../ports/locale"
import { isResourceMap, type ResolvedResource } from "../../ports/resource"
import type {
  ResourceProducer,
  ResourceProducerFactory,
} from "../../ports/resource-producer"
import {
  describeRef,
  type FileResourceRef,
  type InlineResourceRef,
  type ProducerContext,
  type ResourceRef,
  refKey,
} from "../../ports/resource-ref"

export type ResourceProducerDeps = {
  files: FileResolver
  context?: ProducerContext
}

/**
 * Normalize static objects, sync and async producer functions, and file
 * references into one ResourceProducer shape.
 */
export function createResourceProducerFactory(
  deps: ResourceProducerDeps,
): ResourceProducerFactory {
  const context = deps.context ?? {}

  return (ref: ResourceRef): ResourceProducer => {
    const label = describeRef(ref)

    return {
      key: refKey(ref),
      label,
      cacheable: ref.cache,
      produce: async (locale) => {
        const value =
          ref.kind === "file"
            ? await fromFile(deps.files, ref, context, locale)
            : await fromInline(ref, context, locale, label)

        return expectResource(value, label, locale)
      },
    }
  }
}

/**
 * A resource module may export a producer function instead of an object.
 */
async function fromFile(
  files: FileResolver,
  ref: FileResourceRef,
  context: ProducerContext,
  locale: LocaleCode,
): Promise<unknown> {
  let raw: unknown
  try {
    raw = await files.load(ref.path)
  } catch (err) {
    throw new ProducerRejectionError(ref.path, { context: { locale }, cause: err })
  }

  if (typeof raw !== "function") return raw

  const exported = raw
  return callProducer(() => Reflect.apply(exported, undefined, [context, locale]), ref.path, locale)
}

function fromInline(
  ref: InlineResourceRef,
  context: ProducerContext,
  locale: LocaleCode,
  label: string,
): Promise<unknown> | ResolvedResource {
  const { source } = ref
  if (typeof source !== "function") return source

  return callProducer(() => source(context, locale), label, locale)
}

/**
 * Errors thrown or rejected by user code propagate as-is; non-Error
 * rejection values are wrapped.
 */
async function callProducer(
  invoke: () => unknown,
  label: string,
  locale: LocaleCode,
): Promise<unknown> {
  try {
    return await invoke()
  } catch (err) {
    if (err instanceof Error) throw err

    throw new ProducerRejectionError(label, { context: { locale, reason: err } })
  }
}

function expectResource(value: unknown, label: string, locale: LocaleCode): ResolvedResource {
  if (!isResourceMap(value)) {
    throw new MalformedResourceError(label, describeValue(value), { context: { locale } })
  }

  return value
}
