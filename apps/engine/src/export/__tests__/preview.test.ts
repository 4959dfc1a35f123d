import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { buildPreview, generatePreview } from '../preview.js'
import { loadConfig } from '../../lib/config.js'
import { createLogger } from '../../lib/log.js'
import { InputError, OutputError, SchemaError } from '../../lib/errors.js'
import { directive, flatExample } from './fixtures.js'

const config = loadConfig({})
let dir: string

function writeJson(name: string, value: unknown): string {
  const path = join(dir, name)
  writeFileSync(path, JSON.stringify(value), 'utf8')
  return path
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'os-preview-run-'))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

describe('buildPreview', () => {
  it('separates visible and hidden events', () => {
    const { tree, model } = buildPreview(
      directive([
        { title: 'A', stage: 1 },
        { title: 'X', stage: 9, safety_trigger: true },
        { title: 'B', stage: 7 },
      ])
    )
    expect(tree.timeline.map((c) => c.title)).toEqual(['A', 'B'])
    expect(tree.hiddenPanel.groups[1].cards.map((c) => c.title)).toEqual(['X'])
    expect(model.status).toBe('Action')
  })
})

describe('generatePreview', () => {
  it('writes beside the input by default', () => {
    const input = writeJson('plan.json', flatExample)
    const result = generatePreview(input, undefined, { config })
    expect(result.outputPath).toBe(join(dir, 'plan_preview.html'))
    const html = readFileSync(result.outputPath, 'utf8')
    expect(html).toBe(buildPreview(flatExample).html)
    expect(result.bytes).toBe(Buffer.byteLength(html, 'utf8'))
  })

  it('honours an explicit output path and the configured suffix', () => {
    const input = writeJson('plan.json', flatExample)
    const explicit = join(dir, 'custom.html')
    expect(generatePreview(input, explicit, { config }).outputPath).toBe(explicit)
    const suffixed = generatePreview(input, undefined, { config: loadConfig({ PREVIEW_OUTPUT_SUFFIX: '.page.html' }) })
    expect(suffixed.outputPath).toBe(join(dir, 'plan.page.html'))
  })

  it('writes nothing when validation fails', () => {
    const input = writeJson('bad.json', directive([{ title: 'A', stage: 11 }]))
    expect(() => generatePreview(input, undefined, { config })).toThrow(SchemaError)
    expect(existsSync(join(dir, 'bad_preview.html'))).toBe(false)
    expect(readdirSync(dir)).toEqual(['bad.json'])
  })

  it('raises InputError for a missing input', () => {
    expect(() => generatePreview(join(dir, 'none.json'), undefined, { config })).toThrow(InputError)
  })

  it('raises OutputError for an unwritable destination', () => {
    const input = writeJson('plan.json', flatExample)
    expect(() => generatePreview(input, join(dir, 'missing', 'out.html'), { config })).toThrow(OutputError)
  })

  it('logs debug lines only when debug is on', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const input = writeJson('plan.json', flatExample)
    generatePreview(input, undefined, { config, logger: createLogger({ debug: false }) })
    expect(spy).not.toHaveBeenCalled()
    generatePreview(input, undefined, { config, logger: createLogger({ debug: true }) })
    expect(spy).toHaveBeenCalledWith(`[preview]:debug read ${input}`)
  })
})
