// apps/engine/src/index.ts
// Public surface of the preview engine. ESM + NodeNext: include .js on local imports.
export { normalize, DEFAULT_VERSION } from './export/normalize.js'
export type { NormalizeOptions } from './export/normalize.js'
export { partition, groupHidden, layerOf, LAST_VISIBLE_STAGE } from './export/partition.js'
export { render, renderEventCard } from './export/render.js'
export type { RenderOptions } from './export/render.js'
export { emit } from './export/render-html.js'
export {
  readEmbeddedModel,
  EMBED_FORMAT,
  EMBED_FORMAT_VERSION,
  EMBED_ELEMENT_ID,
} from './export/embedded.js'
export type { EmbeddedPayload } from './export/embedded.js'
export { buildPreview, generatePreview } from './export/preview.js'
export type { PreviewOptions, PreviewResult, GenerateOptions, GenerateResult } from './export/preview.js'
export { readDesignDocument, defaultOutputPath, writePreviewAtomic } from './export/document.js'
export { PreviewError, InputError, SchemaError, OutputError, isPreviewError } from './lib/errors.js'
export { loadConfig, getConfig, DEFAULT_OUTPUT_SUFFIX, DEFAULT_SYSTEM_NAME } from './lib/config.js'
export type { PreviewConfig } from './lib/config.js'
export { createLogger } from './lib/log.js'
export type { Logger } from './lib/log.js'
export { flagLevel, statusForLevel, badgeForLevel, toneForStatus } from './lib/status.js'
export type {
  Layer,
  CanonicalEvent,
  CanonicalModel,
  RenderTree,
  RenderSection,
  EventCard,
  HiddenPanel,
} from './export/types.js'
