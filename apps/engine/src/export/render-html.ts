import { renderDataBlock } from './embedded.js'
import type {
  EventCard,
  GlobalStatusSection,
  HiddenPanel,
  OneThingSection,
  ReasoningSection,
  RecentHistorySection,
  RenderSection,
  RenderTree,
  SignalCardsSection,
} from './types.js'
import { escapeHtml } from './utils.js'
import { VIEWER_BOOTSTRAP } from './viewer.js'

const PAGE_STYLES = `
  <style>
    :root{
      --bg:#f5f7fa;
      --page:#ffffff;
      --ink:#111827;
      --muted:#6b7280;
      --border:#e5e7eb;
      --ok:#10b981;
      --warning:#f97316;
      --danger:#dc2626;
    }
    *{box-sizing:border-box;font-family:"Inter",-apple-system,BlinkMacSystemFont,"Segoe UI",sans-serif;}
    body{margin:0;display:flex;background:var(--bg);color:var(--ink);}
    .sidebar{width:220px;min-height:100vh;padding:20px;background:var(--page);border-right:1px solid var(--border);}
    .sidebar h1{margin:0;font-size:20px;}
    .sidebar .version{margin:2px 0 0;font-size:10px;color:var(--muted);}
    .main{flex:1;height:100vh;overflow-y:auto;}
    .topbar{position:sticky;top:0;display:flex;align-items:center;gap:12px;padding:12px 24px;background:var(--page);border-bottom:1px solid var(--border);}
    .topbar h2{margin:0;font-size:20px;}
    .status-dot{width:8px;height:8px;border-radius:999px;background:var(--ok);}
    .status-dot--warning{background:var(--warning);}
    .status-dot--danger{background:var(--danger);}
    .content{padding:24px;display:grid;grid-template-columns:repeat(3,minmax(0,1fr));gap:16px;}
    .section{background:var(--page);border-radius:12px;padding:16px;box-shadow:0 1px 3px rgba(0,0,0,0.06);}
    .section h3{margin:0 0 12px;font-size:14px;}
    .section--global-status,.section--one-thing,.section--signal-cards,.timeline{grid-column:1 / -1;}
    .section--recent-history{grid-column:span 2;}
    .section--one-thing{background:#fff9e5;}
    .one-thing{display:flex;align-items:center;gap:12px;}
    .one-thing-icon{font-size:24px;}
    .one-thing-text{flex:1;margin:0;font-size:18px;font-weight:700;}
    .status-code{display:inline-block;padding:2px 10px;border-radius:999px;font-size:11px;font-weight:600;}
    .tone--ok{background:rgba(16,185,129,0.12);color:#047857;}
    .tone--warning{background:rgba(249,115,22,0.12);color:#9a3412;}
    .tone--danger{background:rgba(220,38,38,0.12);color:#991b1b;}
    .headline{margin:8px 0 0;font-size:18px;font-weight:700;}
    .signal-grid{display:grid;grid-template-columns:repeat(var(--columns,4),minmax(0,1fr));gap:16px;}
    .signal-card{border:1px solid var(--border);border-radius:12px;padding:16px;}
    .signal-icon{display:inline-block;margin-bottom:8px;font-size:18px;}
    .signal-title{margin:0 0 4px;font-size:13px;}
    .signal-progress{height:6px;margin:0 0 8px;border-radius:999px;background:#f3f4f6;overflow:hidden;}
    .signal-progress-bar{display:block;height:100%;}
    .signal-value{margin:0 0 8px;font-size:28px;font-weight:700;}
    .history{list-style:none;margin:0;padding:0;}
    .history-row{display:flex;align-items:center;gap:12px;padding:8px 0;border-bottom:1px solid #f9fafb;font-size:12px;}
    .history-time{width:48px;font-family:ui-monospace,monospace;color:var(--muted);font-size:10px;}
    .history-event{flex:1;}
    .reason-group h4{margin:8px 0 4px;font-size:11px;}
    .reason-group ul{margin:0;padding-left:16px;font-size:10px;color:#4b5563;}
    .reason-group--blue h4{color:#1d4ed8;}
    .reason-group--amber h4{color:#b45309;}
    .reason-group--emerald h4{color:#047857;}
    .reason-group--gray h4{color:#374151;}
    .reason-group--purple h4{color:#6d28d9;}
    .reason-group--indigo h4{color:#4338ca;}
    .coverage,.notes{margin:0 0 6px;font-size:11px;}
    .empty{color:#9ca3af;font-style:italic;font-size:12px;margin:0;}
    .timeline{display:grid;grid-template-columns:repeat(auto-fit,minmax(260px,1fr));gap:16px;}
    .event-card{background:var(--page);border:1px solid var(--border);border-radius:12px;padding:16px;}
    .event-card--safety{border:2px solid var(--danger);}
    .event-card--human-gate{border:2px solid var(--warning);}
    .card-header h4{margin:0 0 6px;font-size:14px;}
    .event-number{color:var(--muted);margin-right:4px;}
    .badges{display:flex;gap:6px;flex-wrap:wrap;}
    .badge{display:inline-flex;align-items:center;border-radius:999px;padding:2px 10px;font-size:11px;font-weight:600;border:1px solid var(--border);}
    .badge--danger{border-color:var(--danger);color:var(--danger);}
    .badge--warning{border-color:var(--warning);color:var(--warning);}
    .description{font-size:12px;color:#4b5563;}
    .event-meta{display:grid;grid-template-columns:auto 1fr;gap:2px 8px;font-size:11px;margin:8px 0;}
    .event-meta dt{font-weight:600;}
    .event-meta dd{margin:0;}
    .btn{border:none;border-radius:999px;padding:6px 14px;font-size:12px;font-weight:600;background:#fbbf24;cursor:pointer;}
    .seal{padding:16px;text-align:center;font-size:10px;color:#4b5563;background:var(--page);border-top:1px solid var(--border);}
    .joe-toggle{position:fixed;bottom:20px;right:20px;z-index:1002;border:none;border-radius:25px;padding:10px 18px;background:#1f2937;color:#fff;font-size:12px;font-weight:600;cursor:pointer;}
    .joe-panel{position:fixed;bottom:60px;right:20px;z-index:999;width:380px;max-height:480px;overflow:hidden;display:none;background:#fff;border-radius:12px;box-shadow:0 10px 30px rgba(0,0,0,0.2);}
    .joe-panel.visible{display:block;}
    .joe-header{background:#1f2937;color:#fff;padding:16px 20px;}
    .joe-header h3{margin:0 0 8px;font-size:15px;}
    .joe-disclaimer{margin:0;font-size:11px;color:#d1d5db;}
    .joe-body{padding:16px;max-height:360px;overflow-y:auto;}
    .joe-section h4{margin:0 0 8px;padding-bottom:4px;font-size:13px;border-bottom:1px solid var(--border);}
    .joe-section .event-card{background:#f9fafb;border-left:3px solid #9ca3af;}
  </style>`

const SEAL_TEXT =
  'This preview is the confirmed screen design of the Standard OS and serves as the basis for build-out and pricing.'

/**
 * Serializes a render tree into one standalone HTML document.
 * Output depends only on the tree: same tree, same bytes.
 */
export function emit(tree: RenderTree): string {
  const { meta } = tree
  const [globalStatus] = tree.sections
  return [
    '<!DOCTYPE html>',
    `<html lang="${escapeHtml(meta.lang)}">`,
    '<head>',
    '<meta charset="UTF-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `<title>${escapeHtml(meta.documentTitle)}</title>`,
    PAGE_STYLES,
    '</head>',
    '<body>',
    '<aside class="sidebar">',
    `<h1>${escapeHtml(meta.systemName)}</h1>`,
    `<p class="version">v${escapeHtml(meta.version)}</p>`,
    '</aside>',
    '<main class="main">',
    '<header class="topbar">',
    '<h2>Dashboard</h2>',
    `<span class="status-dot status-dot--${globalStatus.tone}"></span>`,
    `<span class="status-label">${escapeHtml(globalStatus.label)}</span>`,
    '</header>',
    '<div class="content">',
    ...tree.sections.map(renderSection),
    renderTimeline(tree.timeline),
    '</div>',
    `<footer class="seal"><p>${escapeHtml(SEAL_TEXT)}</p></footer>`,
    '</main>',
    '<button class="joe-toggle" id="joeToggle" type="button">🧠 Developer Mode</button>',
    renderHiddenPanel(tree.hiddenPanel),
    renderDataBlock(tree.data),
    `<script>${VIEWER_BOOTSTRAP}</script>`,
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

function sectionOpen(section: RenderSection): string {
  return `<section class="section section--${section.id}" id="${section.id}" data-section="${section.id}">`
}

function renderSection(section: RenderSection): string {
  switch (section.id) {
    case 'global-status':
      return renderGlobalStatus(section)
    case 'one-thing':
      return renderOneThing(section)
    case 'signal-cards':
      return renderSignalCards(section)
    case 'recent-history':
      return renderRecentHistory(section)
    case 'reasoning':
      return renderReasoning(section)
  }
}

function renderGlobalStatus(s: GlobalStatusSection): string {
  return [
    sectionOpen(s),
    `<h3>${escapeHtml(s.title)}</h3>`,
    `<div class="global-status" data-status="${escapeHtml(s.status)}">`,
    `<span class="status-code tone--${s.tone}">${escapeHtml(s.status)}</span>`,
    `<p class="headline">${escapeHtml(s.headline)}</p>`,
    `<p class="status-label">${escapeHtml(s.label)}</p>`,
    '</div>',
    '</section>',
  ].join('\n')
}

function renderOneThing(s: OneThingSection): string {
  const body = s.text
    ? `<div class="one-thing"><span class="one-thing-icon">${escapeHtml(s.icon)}</span>` +
      `<p class="one-thing-text">${escapeHtml(s.text)}</p>` +
      `<button class="btn" type="button" data-action="one-thing">${escapeHtml(s.actionLabel)} →</button></div>`
    : `<p class="empty">${escapeHtml(s.emptyText)}</p>`
  return [sectionOpen(s), `<h3>${escapeHtml(s.title)}</h3>`, body, '</section>'].join('\n')
}

function renderSignalCards(s: SignalCardsSection): string {
  const cards = s.cards.map((card) =>
    [
      `<article class="signal-card" data-state="${escapeHtml(card.state)}">`,
      `<span class="signal-icon">${escapeHtml(card.icon)}</span>`,
      `<h4 class="signal-title">${escapeHtml(card.title)}</h4>`,
      `<p class="signal-value">${escapeHtml(card.value)}</p>`,
      card.progress === null
        ? ''
        : `<div class="signal-progress"><span class="signal-progress-bar tone--${card.tone}" style="width:${card.progress}%"></span></div>`,
      `<span class="status-code tone--${card.tone}">${escapeHtml(card.state)}</span>`,
      '</article>',
    ].join('')
  )
  const body = cards.length
    ? `<div class="signal-grid" style="--columns:${s.columns}">\n${cards.join('\n')}\n</div>`
    : `<p class="empty">${escapeHtml(s.emptyText)}</p>`
  return [sectionOpen(s), `<h3>${escapeHtml(s.title)}</h3>`, body, '</section>'].join('\n')
}

function renderRecentHistory(s: RecentHistorySection): string {
  const rows = s.entries.map(
    (row) =>
      `<li class="history-row" data-state="${escapeHtml(row.state)}">` +
      `<span class="history-time">${escapeHtml(row.time)}</span>` +
      `<span class="history-event">${escapeHtml(row.event)}</span>` +
      `<span class="status-code tone--${row.tone}">${escapeHtml(row.state)}</span>` +
      '</li>'
  )
  const body = rows.length
    ? `<ol class="history">\n${rows.join('\n')}\n</ol>`
    : `<p class="empty">${escapeHtml(s.emptyText)}</p>`
  return [sectionOpen(s), `<h3>📜 ${escapeHtml(s.title)}</h3>`, body, '</section>'].join('\n')
}

function renderReasoning(s: ReasoningSection): string {
  const lines = [sectionOpen(s), `<h3>💡 ${escapeHtml(s.title)}</h3>`]
  if (s.coverage) lines.push(`<p class="coverage"><strong>Coverage:</strong> ${escapeHtml(s.coverage)}</p>`)
  if (s.notes) lines.push(`<p class="notes">${escapeHtml(s.notes)}</p>`)
  for (const group of s.groups) {
    lines.push(
      `<div class="reason-group reason-group--${group.accent}" data-stage="${group.stage}">` +
        `<h4>${escapeHtml(group.title)}</h4>` +
        `<ul>${group.items.map((item) => `<li>${escapeHtml(item)}</li>`).join('')}</ul>` +
        '</div>'
    )
  }
  if (!s.coverage && !s.notes && !s.groups.length) {
    lines.push(`<p class="empty">${escapeHtml(s.emptyText)}</p>`)
  }
  lines.push('</section>')
  return lines.join('\n')
}

function renderEventCard(card: EventCard): string {
  const modifier =
    card.badge?.tone === 'danger' ? ' event-card--safety' : card.badge?.tone === 'warning' ? ' event-card--human-gate' : ''
  const badge = card.badge
    ? `<span class="badge badge--${card.badge.tone}">${escapeHtml(card.badge.label)}</span>`
    : ''
  const details = card.details
    .map((d) => `<dt>${d.label}</dt><dd>${escapeHtml(d.value)}</dd>`)
    .join('')
  const action = card.actionLabel
    ? `<button class="btn" type="button" data-action="process-event" data-index="${card.index}">${escapeHtml(card.actionLabel)}</button>`
    : ''
  return [
    `<article class="event-card${modifier}" data-index="${card.index}" data-stage="${card.stage}" data-layer="${card.layer}" data-type="${escapeHtml(card.type)}">`,
    '<header class="card-header">',
    `<h4><span class="event-number">#${card.number}</span>${escapeHtml(card.title)}</h4>`,
    `<div class="badges"><span class="badge badge--stage">Stage ${card.stage}</span>${badge}</div>`,
    '</header>',
    `<p class="description">${escapeHtml(card.description)}</p>`,
    `<dl class="event-meta"><dt>Type</dt><dd>${escapeHtml(card.type)}</dd>${details}</dl>`,
    action,
    '</article>',
  ]
    .filter(Boolean)
    .join('\n')
}

function renderTimeline(cards: EventCard[]): string {
  if (!cards.length) return ''
  return [
    '<div class="timeline" data-region="timeline" aria-label="Scenario timeline">',
    ...cards.map(renderEventCard),
    '</div>',
  ].join('\n')
}

function renderHiddenPanel(panel: HiddenPanel): string {
  const groups = panel.groups.map((group) => {
    const body = group.cards.length
      ? group.cards.map(renderEventCard).join('\n')
      : `<p class="empty">${escapeHtml(group.emptyText)}</p>`
    return [
      `<div class="joe-section" data-group="${group.key}" data-stage="${group.stage}">`,
      `<h4>${escapeHtml(group.title)}</h4>`,
      body,
      '</div>',
    ].join('\n')
  })
  return [
    `<aside class="joe-panel" id="joePanel" data-layer="JOE" data-active="${panel.active}" aria-hidden="true">`,
    '<div class="joe-header">',
    `<h3>${escapeHtml(panel.title)}</h3>`,
    `<p class="joe-disclaimer">${escapeHtml(panel.disclaimer)}</p>`,
    '</div>',
    `<div class="joe-body">\n${groups.join('\n')}\n</div>`,
    '</aside>',
  ].join('\n')
}
