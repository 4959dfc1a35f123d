import type { HiddenGroupKey, Layer } from './types.js'

export const LAST_VISIBLE_STAGE = 7

type Staged = { readonly stage: number }

export function layerOf(stage: number): Layer {
  return stage <= LAST_VISIBLE_STAGE ? 'JDE' : 'JOE'
}

/**
 * Splits events into the visible (stages 1-7) and hidden (8-10) layers.
 * Relative order is kept in both lists; every event lands in exactly one.
 */
export function partition<T extends Staged>(events: readonly T[]): { visible: T[]; hidden: T[] } {
  const visible: T[] = []
  const hidden: T[] = []
  for (const event of events) {
    if (layerOf(event.stage) === 'JDE') visible.push(event)
    else hidden.push(event)
  }
  return { visible, hidden }
}

export const HIDDEN_GROUP_STAGES: Record<HiddenGroupKey, number> = {
  observation: 8,
  evaluation: 9,
  evolution: 10,
}

export function groupHidden<T extends Staged>(hidden: readonly T[]): Record<HiddenGroupKey, T[]> {
  return {
    observation: hidden.filter((e) => e.stage === HIDDEN_GROUP_STAGES.observation),
    evaluation: hidden.filter((e) => e.stage === HIDDEN_GROUP_STAGES.evaluation),
    evolution: hidden.filter((e) => e.stage === HIDDEN_GROUP_STAGES.evolution),
  }
}
