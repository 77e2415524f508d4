export type ResourceValue =
  | string
  | number
  | boolean
  | null
  | ResourceValue[]
  | ResourceMap

/**
 * Message keys mapped to translated strings or nested groups of messages.
 * Numbers, booleans and arrays are carried through as opaque leaves.
 */
export interface ResourceMap {
  [key: string]: ResourceValue
}

/** Result of resolving one resource source. */
export type ResolvedResource = ResourceMap

/** Result of folding a locale's resolved sources in declaration order. */
export type MergedResource = ResourceMap

export function isResourceMap(value: unknown): value is ResourceMap {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
