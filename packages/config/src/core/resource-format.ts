import path from "node:path"

/**
 * How a resource file is read: parsed as JSON, or evaluated as a module.
 * TypeScript sources are recognized only so they can be refused: Node.js 20
 * cannot import them without a loader.
 */
export type ResourceFormat = "json" | "script" | "typescript"

const SCRIPT_EXTENSIONS: ReadonlySet<string> = new Set([".js", ".mjs", ".cjs"])

const TYPESCRIPT_EXTENSIONS: ReadonlySet<string> = new Set([".ts", ".mts", ".cts"])

/**
 * Classify a resource file by extension. Returns undefined for formats the
 * loader cannot read at all.
 */
export function resourceFormatOf(file: string): ResourceFormat | undefined {
  const ext = path.extname(file).toLowerCase()

  if (ext === ".json") return "json"
  if (SCRIPT_EXTENSIONS.has(ext)) return "script"
  if (TYPESCRIPT_EXTENSIONS.has(ext)) return "typescript"
  return undefined
}
