import {
  parseDesignDocument,
  type DirectiveDocument,
  type FlatDocument,
  type HistoryEntry,
  type Signal,
} from '@os-preview/schema'
import { DEFAULT_SYSTEM_NAME } from '../lib/config.js'
import { SchemaError } from '../lib/errors.js'
import { flagLevel, highestFlagLevel, isFlagged, statusForLevel } from '../lib/status.js'
import { LAST_VISIBLE_STAGE, layerOf, partition } from './partition.js'
import type { CanonicalEvent, CanonicalModel } from './types.js'
import { freezeDeep, plural } from './utils.js'

export const DEFAULT_VERSION = '1.0'
export const DEFAULT_HISTORY_TIME = '00:00'
export const DEFAULT_ONE_THING_ICON = '📌'
export const DEFAULT_ONE_THING_ACTION = 'Check now'
/** Synthesized signal tiles fill one row of the grid. */
export const SYNTHESIZED_SIGNAL_LIMIT = 4

export type NormalizeOptions = {
  /** Used when a flat document carries no system_name. */
  defaultSystemName?: string
}

/**
 * Validates a parsed design document and converts either input shape into the canonical model.
 * Throws SchemaError listing every failing field.
 */
export function normalize(raw: unknown, options: NormalizeOptions = {}): CanonicalModel {
  const parsed = parseDesignDocument(raw)
  if (!parsed.success) throw new SchemaError(parsed.issues)

  const { data } = parsed
  const model =
    data.kind === 'flat' ? fromFlat(data.document, options) : fromDirective(data.document)
  return freezeDeep(model)
}

// Text fields keep the submitted characters; blank-only values count as absent.
function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() ? value : undefined
}

function versionText(version: string | number | undefined): string {
  if (version === undefined) return DEFAULT_VERSION
  return String(version).trim() || DEFAULT_VERSION
}

function fromFlat(doc: FlatDocument, options: NormalizeOptions): CanonicalModel {
  return {
    systemName: nonBlank(doc.system_name) ?? (options.defaultSystemName || DEFAULT_SYSTEM_NAME),
    version: versionText(doc.version),
    scenario: '',
    status: doc.status,
    headline: doc.headline,
    oneThing: doc.one_thing ?? '',
    oneThingIcon: DEFAULT_ONE_THING_ICON,
    oneThingActionLabel: DEFAULT_ONE_THING_ACTION,
    signals: doc.signals ?? [],
    history: doc.history ?? [],
    reasoning: {
      coverage: doc.reasoning?.coverage ?? '',
      notes: doc.reasoning?.notes ?? '',
    },
    events: [],
  }
}

function fromDirective(doc: DirectiveDocument): CanonicalModel {
  const systemName = doc.system_name
  const scenario = nonBlank(doc.preview_directive.scenario) ?? ''
  const events: CanonicalEvent[] = doc.preview_directive.events.map((event, index) => ({
    ...event,
    index,
    layer: layerOf(event.stage),
  }))
  const { visible } = partition(events)
  const action = doc.one_thing === undefined ? visible.find((e) => e.type === 'action') : undefined

  return {
    systemName,
    version: versionText(doc.version),
    scenario,
    // every layer counts: a hidden-stage safety trigger still halts the scenario
    status: statusForLevel(highestFlagLevel(events)),
    headline: doc.headline ?? (scenario ? `${systemName} · ${scenario}` : systemName),
    oneThing: doc.one_thing ?? action?.title ?? '',
    oneThingIcon: nonBlank(action?.icon) ?? DEFAULT_ONE_THING_ICON,
    oneThingActionLabel: nonBlank(action?.action_label) ?? DEFAULT_ONE_THING_ACTION,
    signals: doc.signals ?? synthesizeSignals(visible),
    history: doc.history ?? synthesizeHistory(visible),
    reasoning: {
      coverage: doc.reasoning?.coverage ?? describeCoverage(visible),
      notes: doc.reasoning?.notes ?? describeAttention(events),
    },
    events,
  }
}

function synthesizeSignals(visible: readonly CanonicalEvent[]): Signal[] {
  return visible.slice(0, SYNTHESIZED_SIGNAL_LIMIT).map((e) => {
    const signal: Signal = {
      title: e.title,
      value: e.value ?? `Stage ${e.stage}`,
      state: statusForLevel(flagLevel(e)),
    }
    if (e.icon !== undefined) signal.icon = e.icon
    if (e.progress !== undefined) signal.progress = e.progress
    return signal
  })
}

/** One entry per visible event, in submission order (never re-sorted by stage). */
function synthesizeHistory(visible: readonly CanonicalEvent[]): HistoryEntry[] {
  return visible.map((e) => ({
    time: nonBlank(e.time) ?? DEFAULT_HISTORY_TIME,
    event: e.title,
    state: statusForLevel(flagLevel(e)),
  }))
}

function describeCoverage(visible: readonly CanonicalEvent[]): string {
  const stages = new Set(visible.map((e) => e.stage))
  return `${stages.size}/${LAST_VISIBLE_STAGE} stages covered`
}

function describeAttention(events: readonly CanonicalEvent[]): string {
  const flagged = events.filter(isFlagged).length
  if (!flagged) return 'No events require attention.'
  return `${plural(flagged, 'event')} flagged for attention.`
}
