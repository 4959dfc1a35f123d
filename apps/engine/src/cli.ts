// apps/engine/src/cli.ts
import { pathToFileURL } from 'node:url'
import { resolve } from 'node:path'
import { getConfig, type PreviewConfig } from './lib/config.js'
import { createLogger, type Logger } from './lib/log.js'
import { errorMessage, isPreviewError, SchemaError } from './lib/errors.js'
import { generatePreview } from './export/preview.js'
import { readDesignDocument } from './export/document.js'
import { normalize } from './export/normalize.js'

export const PREVIEW_USAGE = 'Usage: run-preview <design.json> [output.html]'
export const CHECK_USAGE = 'Usage: check-design <design.json> [more.json ...]'

function reportFailure(logger: Logger, err: unknown): number {
  if (err instanceof SchemaError) {
    logger.error('design document failed validation')
    for (const issue of err.issues) console.error(`   - ${issue.path}: ${issue.message}`)
  } else {
    logger.error(errorMessage(err))
  }
  return isPreviewError(err) ? err.exitCode : 1
}

function resolveConfig(config?: PreviewConfig): PreviewConfig | null {
  if (config) return config
  try {
    return getConfig()
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`)
    return null
  }
}

/** `run-preview <input.json> [output.html]`; returns the process exit code. */
export function runPreviewCli(argv: string[], config?: PreviewConfig): number {
  if (argv.length < 1 || argv.length > 2) {
    console.error(PREVIEW_USAGE)
    return 1
  }
  const cfg = resolveConfig(config)
  if (!cfg) return 1
  const logger = createLogger({ scope: 'preview', debug: cfg.debug })

  const [inputPath, outputPath] = argv
  try {
    const result = generatePreview(inputPath, outputPath, { config: cfg, logger })
    console.log(`✅ Preview generated: ${result.outputPath}`)
    console.log('')
    console.log('🎬 Open the preview in your browser:')
    console.log(`   ${pathToFileURL(result.outputPath).href}`)
    return 0
  } catch (err) {
    return reportFailure(logger, err)
  }
}

/**
 * `check-design <file...>`: validates each document without writing anything.
 * Files are independent; one failure does not stop the rest.
 */
export function runCheckCli(argv: string[], config?: PreviewConfig): number {
  if (!argv.length) {
    console.error(CHECK_USAGE)
    return 1
  }
  const cfg = resolveConfig(config)
  if (!cfg) return 1
  const logger = createLogger({ scope: 'check', debug: cfg.debug })

  let worst = 0
  for (const file of argv) {
    const path = resolve(file)
    try {
      const model = normalize(readDesignDocument(path), { defaultSystemName: cfg.defaultSystemName })
      console.log(`✅ ${file} (${model.status}, ${model.events.length} events)`)
    } catch (err) {
      console.error(`❌ ${file}`)
      worst = Math.max(worst, reportFailure(logger, err))
    }
  }
  return worst
}
