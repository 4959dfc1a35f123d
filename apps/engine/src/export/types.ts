import type { DesignEvent, HistoryEntry, Signal, StatusCode } from '@os-preview/schema'
import type { Badge, Tone } from '../lib/status.js'

/** JDE: operator-facing stages 1-7. JOE: observe/evaluate/record-only stages 8-10. */
export type Layer = 'JDE' | 'JOE'

export type CanonicalEvent = Readonly<DesignEvent> & {
  /** Position in the submitted event list; submission order is authoritative. */
  readonly index: number
  readonly layer: Layer
}

export type CanonicalReasoning = {
  readonly coverage: string
  readonly notes: string
}

/** The only structure the renderer reads. Frozen once built. */
export type CanonicalModel = {
  readonly systemName: string
  readonly version: string
  readonly scenario: string
  readonly status: StatusCode
  readonly headline: string
  readonly oneThing: string
  readonly oneThingIcon: string
  /** Caption of the One Thing button. */
  readonly oneThingActionLabel: string
  readonly signals: ReadonlyArray<Readonly<Signal>>
  readonly history: ReadonlyArray<Readonly<HistoryEntry>>
  readonly reasoning: CanonicalReasoning
  readonly events: ReadonlyArray<CanonicalEvent>
}

export type GlobalStatusSection = {
  id: 'global-status'
  title: string
  status: StatusCode
  tone: Tone
  label: string
  headline: string
  attentionCount: number
}

export type OneThingSection = {
  id: 'one-thing'
  title: string
  text: string
  icon: string
  actionLabel: string
  emptyText: string
}

export type SignalCard = {
  title: string
  value: string
  state: StatusCode
  tone: Tone
  icon: string
  /** Percentage 0-100; null draws no bar. */
  progress: number | null
}

export type SignalCardsSection = {
  id: 'signal-cards'
  title: string
  /** Layout hint only; any number of cards is valid. */
  columns: number
  cards: SignalCard[]
  emptyText: string
}

export type HistoryRow = {
  time: string
  event: string
  state: StatusCode
  tone: Tone
}

export type RecentHistorySection = {
  id: 'recent-history'
  title: string
  entries: HistoryRow[]
  emptyText: string
}

export type StageAccent = 'blue' | 'amber' | 'emerald' | 'gray' | 'purple' | 'indigo'

export type ReasoningGroup = {
  stage: number
  title: string
  accent: StageAccent
  items: string[]
}

export type ReasoningSection = {
  id: 'reasoning'
  title: string
  coverage: string
  notes: string
  groups: ReasoningGroup[]
  emptyText: string
}

export type RenderSection =
  | GlobalStatusSection
  | OneThingSection
  | SignalCardsSection
  | RecentHistorySection
  | ReasoningSection

/** Fixed order, fixed count. */
export type VisibleSections = [
  GlobalStatusSection,
  OneThingSection,
  SignalCardsSection,
  RecentHistorySection,
  ReasoningSection,
]

export type EventDetail = {
  label: 'Input' | 'Output' | 'Reasoning' | 'Constraint'
  value: string
}

export type EventCard = {
  index: number
  number: number
  title: string
  description: string
  type: string
  stage: number
  layer: Layer
  badge: Badge | null
  details: EventDetail[]
  /** Null on the hidden layer, which never proposes actions. */
  actionLabel: string | null
}

export type HiddenGroupKey = 'observation' | 'evaluation' | 'evolution'

export type HiddenGroup = {
  key: HiddenGroupKey
  stage: number
  title: string
  cards: EventCard[]
  emptyText: string
}

export type HiddenPanel = {
  id: 'joe-panel'
  title: string
  disclaimer: string
  /** Always false in emitted output; only a viewer activates the panel. */
  active: false
  groups: HiddenGroup[]
}

export type RenderTree = {
  meta: {
    documentTitle: string
    systemName: string
    version: string
    lang: string
  }
  sections: VisibleSections
  timeline: EventCard[]
  hiddenPanel: HiddenPanel
  data: CanonicalModel
}
