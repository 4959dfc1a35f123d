// apps/engine/src/lib/config.ts
// Entry points load .env (`import 'dotenv/config'`) before anything reads this.
import { z } from 'zod'

export const DEFAULT_OUTPUT_SUFFIX = '_preview.html'
export const DEFAULT_SYSTEM_NAME = 'Standard OS'

const LANG_TAG = /^[A-Za-z]{2,3}(?:-[A-Za-z0-9]{2,8})*$/

const EnvSchema = z.object({
  PREVIEW_OUTPUT_SUFFIX: z
    .string()
    .trim()
    .regex(/^[^/\\]*\.html?$/i, 'must be a file-name suffix ending in .html, e.g. _preview.html')
    .default(DEFAULT_OUTPUT_SUFFIX),
  PREVIEW_LANG: z
    .string()
    .trim()
    .regex(LANG_TAG, 'must be a language tag such as en or ko')
    .default('en'),
  PREVIEW_DEFAULT_SYSTEM_NAME: z.string().trim().min(1, 'must not be empty').default(DEFAULT_SYSTEM_NAME),
  PREVIEW_DEBUG: z
    .string()
    .optional()
    .transform((v) => v === '1' || v?.toLowerCase() === 'true'),
})

export type PreviewConfig = {
  readonly outputSuffix: string
  readonly lang: string
  readonly defaultSystemName: string
  readonly debug: boolean
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PreviewConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${detail}`)
  }
  const e = parsed.data
  return Object.freeze({
    outputSuffix: e.PREVIEW_OUTPUT_SUFFIX,
    lang: e.PREVIEW_LANG,
    defaultSystemName: e.PREVIEW_DEFAULT_SYSTEM_NAME,
    debug: e.PREVIEW_DEBUG,
  })
}

let cached: PreviewConfig | null = null

export function getConfig(): PreviewConfig {
  if (!cached) cached = loadConfig()
  return cached
}
