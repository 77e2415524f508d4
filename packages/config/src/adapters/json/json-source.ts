import fs from "node:fs/promises"
import path from "node:path"
import type { ConfigSource } from "../../ports/source"

export type JsonSourceOptions = {
  /**
   * Path to the JSON file, absolute or relative to `cwd`.
   *
   * @example "i18n.config.json"
   */
  file: string

  /**
   * `true` throws when the file does not exist, `false` yields an empty config.
   */
  required: boolean

  /**
   * @default process.cwd()
   */
  cwd?: string
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return {}
      }
      throw err
    }

    const parsed: unknown = JSON.parse(content)

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new TypeError(`${filePath} must contain a JSON object`)
    }

    return { ...parsed }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
