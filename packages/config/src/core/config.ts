import type { IConfig } from "../ports/config"

export type ConfigSnapshot<T> = Readonly<{
  value: T

  /** Name of the last source that set each top-level key */
  origins: ReadonlyMap<string, string>

  /** Top-level keys any source provided, whether the schema knows them or not */
  provided: ReadonlySet<string>
}>

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  readonly value: T

  constructor(private readonly snapshot: ConfigSnapshot<T>) {
    this.value = Object.freeze(snapshot.value)
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.value).filter((k): k is keyof T & string => k in this.value)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.snapshot.origins.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.snapshot.origins.values())]
  }

  unknownKeys(): string[] {
    return [...this.snapshot.provided].filter((k) => !(k in this.value))
  }
}
