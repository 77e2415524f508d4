import path from "node:path"
import { fileURLToPath } from "node:url"

export const fixturesDir = fileURLToPath(new URL("../fixtures", import.meta.url))

export function fixture(...segments: string[]): string {
  return path.join(fixturesDir, ...segments)
}
