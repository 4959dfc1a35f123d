// apps/engine/src/lib/errors.ts
import type { SchemaIssue } from '@os-preview/schema'

export type PreviewErrorCode = 'INPUT_ERROR' | 'SCHEMA_ERROR' | 'OUTPUT_ERROR'

/**
 * Base class for every failure the pipeline reports to its caller.
 * `exitCode` is what the CLI exits with; anything that is not a PreviewError exits 1.
 */
export class PreviewError extends Error {
  readonly code: PreviewErrorCode
  readonly exitCode: number

  constructor(code: PreviewErrorCode, message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.exitCode = exitCode
  }
}

/** Input file unreadable or not JSON. Raised before normalization. */
export class InputError extends PreviewError {
  readonly path: string

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('INPUT_ERROR', message, 2, options)
    this.path = path
  }
}

export class SchemaError extends PreviewError {
  readonly issues: SchemaIssue[]

  constructor(issues: SchemaIssue[]) {
    super('SCHEMA_ERROR', formatIssues(issues), 3)
    this.issues = issues
  }
}

/** Destination unwritable. Raised after rendering; nothing is left at the destination. */
export class OutputError extends PreviewError {
  readonly path: string

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('OUTPUT_ERROR', message, 4, options)
    this.path = path
  }
}

export function isPreviewError(err: unknown): err is PreviewError {
  return err instanceof PreviewError
}

function formatIssues(issues: SchemaIssue[]): string {
  if (!issues.length) return 'Invalid design document'
  return `Invalid design document: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
