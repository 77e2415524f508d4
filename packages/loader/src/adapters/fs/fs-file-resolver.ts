import fs from "node:fs/promises"
import { pathToFileURL } from "node:url"
import { resourceFormatOf } from "@lazyglot/config"
import type { FileResolver } from "../../ports/file-resolver"

/**
 * Reads JSON resources from disk and evaluates script resources as modules.
 *
 * Script formats are only ever declared when the experimental format gate
 * allowed them during config validation.
 */
export class FsFileResolver implements FileResolver {
  async load(absolutePath: string): Promise<unknown> {
    const format = resourceFormatOf(absolutePath)

    if (format === "json") {
      const content = await fs.readFile(absolutePath, "utf-8")
      return JSON.parse(content)
    }

    if (format === "script") {
      const mod: unknown = await import(pathToFileURL(absolutePath).href)
      return moduleExport(mod)
    }

    throw new TypeError(`Unsupported resource format: ${absolutePath}`)
  }
}

function moduleExport(mod: unknown): unknown {
  if (typeof mod === "object" && mod !== null && "default" in mod) {
    return mod.default
  }
  return mod
}
