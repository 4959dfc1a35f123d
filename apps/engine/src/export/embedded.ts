// Data block contract between emitted previews and browser-side viewers.
// Bump EMBED_FORMAT_VERSION on any incompatible change to the payload shape.
import { z } from 'zod'
import { EventSchema, HistoryEntrySchema, SignalSchema, StatusCodeEnum } from '@os-preview/schema'
import type { CanonicalModel } from './types.js'
import { serializeForScript } from './utils.js'

export const EMBED_FORMAT = 'os-preview'
export const EMBED_FORMAT_VERSION = 1
export const EMBED_ELEMENT_ID = 'os-preview-data'

const CanonicalModelSchema = z.object({
  systemName: z.string(),
  version: z.string(),
  scenario: z.string(),
  status: StatusCodeEnum,
  headline: z.string(),
  oneThing: z.string(),
  oneThingIcon: z.string(),
  oneThingActionLabel: z.string(),
  signals: z.array(SignalSchema),
  history: z.array(HistoryEntrySchema),
  reasoning: z.object({ coverage: z.string(), notes: z.string() }),
  events: z.array(
    EventSchema.extend({
      index: z.number().int().nonnegative(),
      layer: z.enum(['JDE', 'JOE']),
    })
  ),
})

const EmbeddedPayloadSchema = z.object({
  format: z.literal(EMBED_FORMAT),
  formatVersion: z.literal(EMBED_FORMAT_VERSION),
  model: CanonicalModelSchema,
})

export type EmbeddedPayload = {
  format: typeof EMBED_FORMAT
  formatVersion: typeof EMBED_FORMAT_VERSION
  model: CanonicalModel
}

export function renderDataBlock(model: CanonicalModel): string {
  const payload: EmbeddedPayload = {
    format: EMBED_FORMAT,
    formatVersion: EMBED_FORMAT_VERSION,
    model,
  }
  return (
    `<script type="application/json" id="${EMBED_ELEMENT_ID}" data-format="${EMBED_FORMAT}" data-format-version="${EMBED_FORMAT_VERSION}">` +
    serializeForScript(payload) +
    '</script>'
  )
}

const DATA_BLOCK_RX = new RegExp(
  `<script type="application/json" id="${EMBED_ELEMENT_ID}"[^>]*>([\\s\\S]*?)</script>`
)

/** Reads the canonical model back out of an emitted preview. */
export function readEmbeddedModel(html: string): EmbeddedPayload {
  const match = DATA_BLOCK_RX.exec(html)
  if (!match) throw new Error(`No #${EMBED_ELEMENT_ID} data block found`)
  const parsed = EmbeddedPayloadSchema.safeParse(JSON.parse(match[1]))
  if (!parsed.success) {
    throw new Error(`Embedded preview data is not ${EMBED_FORMAT} v${EMBED_FORMAT_VERSION}: ${parsed.error.message}`)
  }
  return parsed.data
}
