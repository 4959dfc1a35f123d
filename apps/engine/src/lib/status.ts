// apps/engine/src/lib/status.ts
// Single source of truth for status codes and the event flag precedence
// (safety trigger > human gate > none). Status derivation and badge selection both go through here.
import type { StatusCode } from '@os-preview/schema'

export const Status = {
  OK: 'OK',
  WARNING: 'Warning',
  ACTION: 'Action',
} as const satisfies Record<string, StatusCode>

export type FlagLevel = 'safety' | 'human_gate' | 'none'
export type Tone = 'ok' | 'warning' | 'danger'

export type Flagged = {
  readonly human_gate: boolean
  readonly safety_trigger: boolean
}

export type Badge = {
  label: string
  tone: Tone
}

const LEVEL_RANK: Record<FlagLevel, number> = { none: 0, human_gate: 1, safety: 2 }

export function flagLevel(event: Flagged): FlagLevel {
  if (event.safety_trigger) return 'safety'
  if (event.human_gate) return 'human_gate'
  return 'none'
}

export function highestFlagLevel(events: readonly Flagged[]): FlagLevel {
  let top: FlagLevel = 'none'
  for (const e of events) {
    const level = flagLevel(e)
    if (LEVEL_RANK[level] > LEVEL_RANK[top]) top = level
  }
  return top
}

export function statusForLevel(level: FlagLevel): StatusCode {
  switch (level) {
    case 'safety':
      return Status.ACTION
    case 'human_gate':
      return Status.WARNING
    case 'none':
      return Status.OK
  }
}

export function toneForStatus(status: StatusCode): Tone {
  switch (status) {
    case 'Action':
      return 'danger'
    case 'Warning':
      return 'warning'
    case 'OK':
      return 'ok'
  }
}

export function badgeForLevel(level: FlagLevel): Badge | null {
  const tone = toneForStatus(statusForLevel(level))
  switch (level) {
    case 'safety':
      return { label: '🛑 Safety', tone }
    case 'human_gate':
      return { label: '👤 Human Gate', tone }
    case 'none':
      return null
  }
}

export function isFlagged(event: Flagged): boolean {
  return flagLevel(event) !== 'none'
}
