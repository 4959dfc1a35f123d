// Shared design documents for the export tests.

export const flatExample = {
  status: 'OK',
  headline: 'H',
  one_thing: 'T',
  signals: [{ title: 'A', value: 1, state: 'OK' }],
  history: [],
  reasoning: { coverage: 'c', notes: 'n' },
}

type EventInput = {
  title: string
  stage: number
  type?: string
  description?: string
  human_gate?: unknown
  safety_trigger?: unknown
  [key: string]: unknown
}

export function event(input: EventInput) {
  return { description: `${input.title} description`, type: 'step', ...input }
}

export function directive(events: EventInput[], extra: Record<string, unknown> = {}) {
  return {
    system_name: 'Line Ops',
    version: '2.1',
    preview_directive: { scenario: 'Night shift', events: events.map(event) },
    ...extra,
  }
}
