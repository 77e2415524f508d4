import type { LocaleCode } from "./locale"
import type { MergedResource } from "./resource"

/**
 * idle → resolving → merging → ready
 * idle → resolving → failed
 *
 * `superseded` marks an activation overtaken by a newer one: either skipped
 * at its turn to install, or installed while the newer one was pending.
 */
export type ActivationState =
  | "idle"
  | "resolving"
  | "merging"
  | "ready"
  | "failed"
  | "superseded"

export type ActivationResult = Readonly<{
  locale: LocaleCode
  /** Monotonic sequence number of this activation */
  activation: number
  resource: MergedResource
  /** Whether the resource was handed to the catalog consumer */
  delivered: boolean
}>
