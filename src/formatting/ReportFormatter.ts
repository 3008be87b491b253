import type { Descriptions, InventoryItem, Snapshot, SnapshotDiff } from '../contracts'

const SECTION_TITLES = {
  added: '🎁 Added items',
  removed: '📤 Removed items',
  changed: '🔄 Quantity changes',
} as const

const UNKNOWN_ITEM = 'Unknown item'

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

/**
 * Display name for a class/instance pair.
 * Falls back to the class id when the last fetch carried no description for it.
 */
export function resolveItemName(
  descriptions: Descriptions,
  classid: string | undefined,
  instanceid: string | undefined
): string {
  const description = descriptions.get(`${classid}_${instanceid}`)
  if (!description) {
    return `Item ID: ${classid}`
  }
  return description.market_hash_name ?? description.name ?? UNKNOWN_ITEM
}

function renderSection(title: string, lines: string[]): string {
  return `<h3>${title} (${lines.length}):</h3><ul>${lines.map((line) => `<li>${line}</li>`).join('')}</ul>`
}

function itemLine(item: InventoryItem, descriptions: Descriptions): string {
  const name = resolveItemName(descriptions, item.classid, item.instanceid)
  return `${escapeHtml(name)} x${escapeHtml(item.amount)}`
}

/**
 * Render a diff as HTML markup: one section per non-empty category, in the
 * order added, removed, changed. An empty diff renders as an empty string.
 */
export function renderReport(
  diff: SnapshotDiff,
  previous: Snapshot,
  descriptions: Descriptions
): string {
  const sections: string[] = []

  if (diff.added.size > 0) {
    const lines = Array.from(diff.added.values(), (item) => itemLine(item, descriptions))
    sections.push(renderSection(SECTION_TITLES.added, lines))
  }

  if (diff.removed.size > 0) {
    const lines = Array.from(diff.removed.values(), (item) => itemLine(item, descriptions))
    sections.push(renderSection(SECTION_TITLES.removed, lines))
  }

  if (diff.changed.size > 0) {
    const lines = Array.from(diff.changed, ([assetId, change]) => {
      const before = previous.get(assetId)
      const name = resolveItemName(descriptions, before?.classid, before?.instanceid)
      return `${escapeHtml(name)}: ${escapeHtml(change.oldAmount)} → ${escapeHtml(change.newAmount)}`
    })
    sections.push(renderSection(SECTION_TITLES.changed, lines))
  }

  return sections.join('')
}

/**
 * Plain-text rendering of report markup for transports that take no HTML.
 */
export function stripMarkup(html: string): string {
  return html
    .replace(/<(h[1-6]|p)>/gi, '\n')
    .replace(/<\/(h[1-6]|p|li)>/gi, '\n')
    .replace(/<li>/gi, '  • ')
    .replace(/<[^>]*>/g, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/^\n+|\n+$/g, '')
}

const pad = (value: number): string => String(value).padStart(2, '0')

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}
