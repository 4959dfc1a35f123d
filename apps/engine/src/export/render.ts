import { badgeForLevel, flagLevel, isFlagged, toneForStatus } from '../lib/status.js'
import { groupHidden, HIDDEN_GROUP_STAGES } from './partition.js'
import type {
  CanonicalEvent,
  CanonicalModel,
  EventCard,
  EventDetail,
  GlobalStatusSection,
  HiddenGroup,
  HiddenGroupKey,
  HiddenPanel,
  OneThingSection,
  ReasoningGroup,
  ReasoningSection,
  RecentHistorySection,
  RenderTree,
  SignalCardsSection,
  StageAccent,
} from './types.js'
import { plural } from './utils.js'

export type RenderOptions = {
  lang?: string
}

export const SIGNAL_GRID_COLUMNS = 4
export const DEFAULT_SIGNAL_ICON = '📊'

// Operator-facing wording for the visible stages.
const STAGE_TITLES: Record<number, { title: string; accent: StageAccent }> = {
  1: { title: 'Why was this decided?', accent: 'blue' },
  2: { title: 'Standards we always kept', accent: 'blue' },
  3: { title: 'Risk detection and protection', accent: 'amber' },
  4: { title: 'Past records', accent: 'emerald' },
  5: { title: 'Decision log', accent: 'gray' },
  6: { title: 'Operating efficiency', accent: 'purple' },
  7: { title: 'Areas that may change', accent: 'indigo' },
}

const HIDDEN_GROUP_TITLES: Record<HiddenGroupKey, string> = {
  observation: '📊 Observation (Stage 8)',
  evaluation: '📈 Evaluation (Stage 9)',
  evolution: '🔄 Evolution (Stage 10)',
}

const DETAIL_FIELDS = [
  ['input', 'Input'],
  ['output', 'Output'],
  ['reasoning', 'Reasoning'],
  ['constraint', 'Constraint'],
] as const

/**
 * Maps the canonical model onto the fixed page: five visible sections, the visible-layer
 * timeline, and the hidden developer panel (inactive by default).
 */
export function render(
  model: CanonicalModel,
  visible: readonly CanonicalEvent[],
  hidden: readonly CanonicalEvent[],
  options: RenderOptions = {}
): RenderTree {
  return {
    meta: {
      documentTitle: `${model.systemName} - Standard OS Preview`,
      systemName: model.systemName,
      version: model.version,
      lang: options.lang || 'en',
    },
    sections: [
      renderGlobalStatus(model),
      renderOneThing(model),
      renderSignalCards(model),
      renderRecentHistory(model),
      renderReasoning(model, visible),
    ],
    timeline: visible.map(renderEventCard),
    hiddenPanel: renderHiddenPanel(hidden),
    data: model,
  }
}

function renderGlobalStatus(model: CanonicalModel): GlobalStatusSection {
  const attentionCount = model.events.filter(isFlagged).length
  let label = `${model.systemName} operating normally`
  if (model.status !== 'OK') {
    const lead = model.status === 'Action' ? 'Action required' : 'Attention needed'
    label = attentionCount ? `${lead} · ${plural(attentionCount, 'item')}` : lead
  }
  return {
    id: 'global-status',
    title: 'Global Status',
    status: model.status,
    tone: toneForStatus(model.status),
    label,
    headline: model.headline,
    attentionCount,
  }
}

function renderOneThing(model: CanonicalModel): OneThingSection {
  return {
    id: 'one-thing',
    title: "Today's One Thing",
    text: model.oneThing,
    icon: model.oneThingIcon,
    actionLabel: model.oneThingActionLabel,
    emptyText: 'Nothing pressing today.',
  }
}

function renderSignalCards(model: CanonicalModel): SignalCardsSection {
  return {
    id: 'signal-cards',
    title: 'Signal Cards',
    columns: SIGNAL_GRID_COLUMNS,
    cards: model.signals.map((s) => ({
      title: s.title,
      value: String(s.value),
      state: s.state,
      tone: toneForStatus(s.state),
      icon: s.icon || DEFAULT_SIGNAL_ICON,
      progress: s.progress ?? null,
    })),
    emptyText: 'No signals reported.',
  }
}

function renderRecentHistory(model: CanonicalModel): RecentHistorySection {
  return {
    id: 'recent-history',
    title: 'Recent History',
    entries: model.history.map((h) => ({
      time: h.time,
      event: h.event,
      state: h.state,
      tone: toneForStatus(h.state),
    })),
    emptyText: 'No recent activity.',
  }
}

function renderReasoning(model: CanonicalModel, visible: readonly CanonicalEvent[]): ReasoningSection {
  const groups: ReasoningGroup[] = []
  for (const [stageKey, { title, accent }] of Object.entries(STAGE_TITLES)) {
    const stage = Number(stageKey)
    const items = visible
      .filter((e) => e.stage === stage)
      .map((e) => e.reasoning ?? e.description)
    if (items.length) groups.push({ stage, title, accent, items })
  }
  return {
    id: 'reasoning',
    title: 'Reasoning',
    coverage: model.reasoning.coverage,
    notes: model.reasoning.notes,
    groups,
    emptyText: 'No reasoning recorded.',
  }
}

export function renderEventCard(event: CanonicalEvent): EventCard {
  const level = flagLevel(event)
  const details: EventDetail[] = []
  for (const [key, label] of DETAIL_FIELDS) {
    const value = event[key]
    if (value !== undefined) details.push({ label, value })
  }
  let actionLabel: string | null = null
  if (event.layer === 'JDE') {
    actionLabel = level === 'safety' ? '⚠️ Proceed with Caution' : '▶️ Execute Event'
  }
  return {
    index: event.index,
    number: event.index + 1,
    title: event.title,
    description: event.description,
    type: event.type,
    stage: event.stage,
    layer: event.layer,
    badge: badgeForLevel(level),
    details,
    actionLabel,
  }
}

function renderHiddenPanel(hidden: readonly CanonicalEvent[]): HiddenPanel {
  const grouped = groupHidden(hidden)
  const keys: HiddenGroupKey[] = ['observation', 'evaluation', 'evolution']
  const groups: HiddenGroup[] = keys.map((key) => ({
    key,
    stage: HIDDEN_GROUP_STAGES[key],
    title: HIDDEN_GROUP_TITLES[key],
    cards: grouped[key].map(renderEventCard),
    emptyText: 'No data recorded',
  }))
  return {
    id: 'joe-panel',
    title: '🧠 JOE Layer (Developer / Auditor Mode)',
    disclaimer:
      'This panel shows system-level observation and evaluation. It does not affect operator decisions.',
    active: false,
    groups,
  }
}
