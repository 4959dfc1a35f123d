import { resolve } from 'node:path'
import type { PreviewConfig } from '../lib/config.js'
import { silentLogger, type Logger } from '../lib/log.js'
import { defaultOutputPath, readDesignDocument, writePreviewAtomic } from './document.js'
import { normalize } from './normalize.js'
import { partition } from './partition.js'
import { render } from './render.js'
import { emit } from './render-html.js'
import type { CanonicalModel, RenderTree } from './types.js'

export type PreviewOptions = {
  lang?: string
  defaultSystemName?: string
}

export type PreviewResult = {
  html: string
  model: CanonicalModel
  tree: RenderTree
}

/** normalize -> partition -> render -> emit, all in memory. */
export function buildPreview(raw: unknown, options: PreviewOptions = {}): PreviewResult {
  const model = normalize(raw, { defaultSystemName: options.defaultSystemName })
  const { visible, hidden } = partition(model.events)
  const tree = render(model, visible, hidden, { lang: options.lang })
  return { html: emit(tree), model, tree }
}

export type GenerateOptions = {
  config: PreviewConfig
  logger?: Logger
}

export type GenerateResult = {
  inputPath: string
  outputPath: string
  model: CanonicalModel
  bytes: number
}

/**
 * One synchronous pass from input file to output file. Errors surface as InputError,
 * SchemaError or OutputError; the destination is written only after rendering succeeds.
 */
export function generatePreview(
  inputPath: string,
  outputPath: string | undefined,
  { config, logger = silentLogger }: GenerateOptions
): GenerateResult {
  const input = resolve(inputPath)
  const output = resolve(outputPath || defaultOutputPath(input, config.outputSuffix))

  const raw = readDesignDocument(input)
  logger.debug(`read ${input}`)

  const { html, model, tree } = buildPreview(raw, {
    lang: config.lang,
    defaultSystemName: config.defaultSystemName,
  })
  logger.debug(
    `rendered status=${model.status} visible=${tree.timeline.length} hidden=${model.events.length - tree.timeline.length}`
  )

  writePreviewAtomic(output, html)
  const bytes = Buffer.byteLength(html, 'utf8')
  logger.debug(`wrote ${bytes} bytes to ${output}`)

  return { inputPath: input, outputPath: output, model, bytes }
}
