import { describe, it, expect } from 'vitest'
import { groupHidden, layerOf, partition } from '../partition.js'

const staged = (stages: number[]) => stages.map((stage, i) => ({ id: `e${i}`, stage }))

describe('layerOf', () => {
  it('puts stages 1-7 on the visible layer and 8-10 on the hidden one', () => {
    expect([1, 4, 7].map(layerOf)).toEqual(['JDE', 'JDE', 'JDE'])
    expect([8, 9, 10].map(layerOf)).toEqual(['JOE', 'JOE', 'JOE'])
  })
})

describe('partition', () => {
  it('returns two empty lists for no events', () => {
    expect(partition([])).toEqual({ visible: [], hidden: [] })
  })

  it('keeps relative order within each layer', () => {
    const events = staged([9, 2, 8, 7, 1, 10, 3])
    const { visible, hidden } = partition(events)
    expect(visible.map((e) => e.id)).toEqual(['e1', 'e3', 'e4', 'e6'])
    expect(hidden.map((e) => e.id)).toEqual(['e0', 'e2', 'e5'])
  })

  it('neither drops nor duplicates events', () => {
    const events = staged([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 5, 9])
    const { visible, hidden } = partition(events)
    expect(visible.length + hidden.length).toBe(events.length)
    expect(new Set([...visible, ...hidden]).size).toBe(events.length)
    expect(visible.every((e) => e.stage <= 7)).toBe(true)
    expect(hidden.every((e) => e.stage >= 8)).toBe(true)
  })

  it('does not modify its input', () => {
    const events = staged([8, 1])
    const copy = events.map((e) => ({ ...e }))
    partition(events)
    expect(events).toEqual(copy)
  })
})

describe('groupHidden', () => {
  it('splits the hidden layer into observation, evaluation and evolution', () => {
    const { hidden } = partition(staged([8, 10, 9, 8, 2]))
    const groups = groupHidden(hidden)
    expect(groups.observation.map((e) => e.id)).toEqual(['e0', 'e3'])
    expect(groups.evaluation.map((e) => e.id)).toEqual(['e2'])
    expect(groups.evolution.map((e) => e.id)).toEqual(['e1'])
  })
})
