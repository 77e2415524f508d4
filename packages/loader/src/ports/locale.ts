import type { ResourceRef } from "./resource-ref"

export type LocaleCode = string

/**
 * Declares where a locale's messages come from.
 *
 * `sources` is never empty. Its order is the merge precedence: later sources
 * override keys of earlier ones.
 */
export type LocaleDescriptor = Readonly<{
  code: LocaleCode
  sources: readonly ResourceRef[]
}>
