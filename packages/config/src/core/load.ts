import { ConfigValidationError } from "@lazyglot/errors"
import { type ZodType, z } from "zod"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { type I18nOptions, i18nOptionsSchema } from "./schema"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const origins = new Map<string, string>()

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      origins.set(key, source.name)
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(z.prettifyError(result.error), {
      context: { sources: sources.map((s) => s.name) },
      cause: result.error,
    })
  }

  return new Config<T>({ value: result.data, origins, provided: new Set(Object.keys(merged)) })
}

export function loadI18nConfig(options: {
  sources: readonly ConfigSource[]
}): Promise<IConfig<I18nOptions>> {
  return loadConfig({ schema: i18nOptionsSchema, sources: options.sources })
}
