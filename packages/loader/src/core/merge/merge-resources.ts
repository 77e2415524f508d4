import {
  isResourceMap,
  type MergedResource,
  type ResolvedResource,
  type ResourceMap,
  type ResourceValue,
} from "../../ports/resource"

/**
 * Keys skipped while merging, so a resource file cannot reach Object.prototype.
 */
const UNSAFE_KEYS: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"])

/**
 * Fold resolved resources left to right into a fresh mapping.
 *
 * Where both sides hold a mapping the merge recurses; any other incoming value
 * replaces the accumulated one. The result shares no objects or arrays with
 * its inputs.
 *
 * @example
 * ```ts
 * mergeResources([
 *   { nav: { home: "Inicio", about: "Acerca" } },
 *   { nav: { home: "Inicio (AR)" } },
 * ])
 * // { nav: { home: "Inicio (AR)", about: "Acerca" } }
 * ```
 */
export function mergeResources(sequence: readonly ResolvedResource[]): MergedResource {
  return sequence.reduce<ResourceMap>((acc, next) => overrideInto(acc, next), {})
}

/**
 * Apply `incoming` onto `target` in place. `target` must be owned by the
 * caller: it is always a copy made during the current merge.
 */
function overrideInto(target: ResourceMap, incoming: ResourceMap): ResourceMap {
  for (const key of Object.keys(incoming)) {
    if (UNSAFE_KEYS.has(key)) continue

    const next = incoming[key]
    const current = Object.hasOwn(target, key) ? target[key] : undefined

    target[key] =
      isResourceMap(current) && isResourceMap(next)
        ? overrideInto(current, next)
        : copyValue(next)
  }

  return target
}

function copyValue(value: ResourceValue): ResourceValue {
  if (Array.isArray(value)) return value.map(copyValue)
  if (isResourceMap(value)) return overrideInto({}, value)
  return value
}
