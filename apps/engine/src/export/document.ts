import { readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { basename, dirname, extname, join } from 'node:path'
import { DEFAULT_OUTPUT_SUFFIX } from '../lib/config.js'
import { InputError, OutputError, errorMessage } from '../lib/errors.js'

/** Reads and parses the design document. Shape validation happens later, in normalize(). */
export function readDesignDocument(path: string): unknown {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (err) {
    throw new InputError(path, `Cannot read design document ${path}: ${errorMessage(err)}`, { cause: err })
  }
  try {
    return JSON.parse(text.replace(/^\uFEFF/, ''))
  } catch (err) {
    throw new InputError(path, `Invalid JSON in ${path}: ${errorMessage(err)}`, { cause: err })
  }
}

/** `plans/night-shift.json` -> `plans/night-shift_preview.html` */
export function defaultOutputPath(inputPath: string, suffix: string = DEFAULT_OUTPUT_SUFFIX): string {
  const ext = extname(inputPath)
  const stem = basename(inputPath, ext)
  return join(dirname(inputPath), `${stem}${suffix}`)
}

/**
 * Writes the whole document or nothing: the HTML goes to a temp file beside the destination
 * and is renamed over it. A failed write removes the temp file.
 */
export function writePreviewAtomic(path: string, html: string): void {
  const tmp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`)
  try {
    writeFileSync(tmp, html, { encoding: 'utf8', flag: 'w' })
    renameSync(tmp, path)
  } catch (err) {
    rmSync(tmp, { force: true })
    throw new OutputError(path, `Cannot write preview to ${path}: ${errorMessage(err)}`, { cause: err })
  }
}
