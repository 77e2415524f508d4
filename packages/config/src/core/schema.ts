import { z } from "zod"
import { resourceFormatOf } from "./resource-format"

export const localeFileSchema = z.union([
  z.string().min(1),
  z.object({
    path: z.string().min(1),
    cache: z.boolean().default(true),
  }),
])

export const localeEntrySchema = z.object({
  code: z.string().min(1),
  name: z.string().optional(),
  file: localeFileSchema.optional(),
  files: z.array(localeFileSchema).optional(),
})

export const i18nOptionsSchema = z
  .object({
    /** Load a locale's resources only when it is first activated. */
    lazy: z.boolean().default(false),

    rootDir: z.string().default(() => process.cwd()),

    /** Directory, relative to rootDir, that file sources resolve against. */
    langDir: z.string().default("locales"),

    defaultLocale: z.string().optional(),

    /**
     * Drop the result of an activation that finishes after a newer one was
     * requested, instead of letting the last one to finish win.
     */
    discardStaleActivations: z.boolean().default(true),

    experimental: z
      .object({
        /** Allow .js, .mjs and .cjs resource files, which are evaluated to produce messages. */
        jsTsFormatResource: z.boolean().default(false),
      })
      .default({ jsTsFormatResource: false }),

    locales: z.array(localeEntrySchema).min(1),
  })
  .superRefine((options, ctx) => {
    const seen = new Set<string>()

    options.locales.forEach((locale, i) => {
      if (seen.has(locale.code)) {
        ctx.addIssue({
          code: "custom",
          message: `Locale '${locale.code}' is declared more than once`,
          path: ["locales", i, "code"],
        })
      }
      seen.add(locale.code)

      if (locale.file !== undefined && locale.files !== undefined) {
        ctx.addIssue({
          code: "custom",
          message: `Locale '${locale.code}' sets both file and files`,
          path: ["locales", i],
        })
        return
      }

      const files = locale.files ?? (locale.file === undefined ? [] : [locale.file])

      if (files.length === 0) {
        ctx.addIssue({
          code: "custom",
          message: `Locale '${locale.code}' declares no resource files`,
          path: ["locales", i],
        })
      }

      files.forEach((entry, j) => {
        const file = typeof entry === "string" ? entry : entry.path
        const format = resourceFormatOf(file)
        const at = locale.files === undefined ? ["locales", i, "file"] : ["locales", i, "files", j]

        if (format === "typescript") {
          ctx.addIssue({
            code: "custom",
            message: `${file} is a TypeScript resource; compile it to .js or .mjs`,
            path: at,
          })
        } else if (format === undefined) {
          ctx.addIssue({
            code: "custom",
            message: `Unsupported resource format: ${file}`,
            path: at,
          })
        } else if (format === "script" && !options.experimental.jsTsFormatResource) {
          ctx.addIssue({
            code: "custom",
            message: `${file} needs experimental.jsTsFormatResource to be enabled`,
            path: at,
          })
        }
      })
    })

    if (options.defaultLocale !== undefined && !seen.has(options.defaultLocale)) {
      ctx.addIssue({
        code: "custom",
        message: `defaultLocale '${options.defaultLocale}' is not a declared locale`,
        path: ["defaultLocale"],
      })
    }
  })

export type I18nOptions = z.output<typeof i18nOptionsSchema>
export type I18nOptionsInput = z.input<typeof i18nOptionsSchema>
export type LocaleEntry = z.output<typeof localeEntrySchema>
export type LocaleFile = z.output<typeof localeFileSchema>
