import { encodeTimecode, tryDecodeTimecode } from '../../utils/timecode'
import type { CutMarkerEntry, ParsedTimeline, TimelineEntry } from './types'

const LINE_RE = /^\s*(\d+:\d{2}:\d{2}):\s?(.*)$/
// A timecode carried right after the cut token, e.g. "CUT 00:01:02" or "cut: 01:02".
const EMBEDDED_CUT_TIME_RE = /^cut\s*:?\s*(\d+:\d{2}(?::\d{2})?)(?=$|[\s:])/i

export function isCutText(text: string): boolean {
  return text.trim().toLowerCase().startsWith('cut')
}

// Leading cut token or embedded timecode, then at most one `:` or `-` separator.
function cutReason(trimmed: string, embedded: RegExpMatchArray | null): string {
  if (embedded) return trimmed.slice(embedded[0].length).replace(/^\s*[:-]?\s*/, '').trim()
  // "Cutting onions" is a marker, but the whole caption is its reason.
  if (!/^cut\b/i.test(trimmed)) return trimmed
  return trimmed.slice('cut'.length).replace(/^\s*[:-]?\s*/, '').trim()
}

/**
 * Reads annotation text that starts with "cut" as a cut marker. The marker sits
 * at the timecode embedded right after the cut token, else at `lineSeconds`;
 * null when there is neither. The text is kept verbatim on the entry.
 */
export function cutMarkerFromText(lineSeconds: number | null, text: string): CutMarkerEntry | null {
  const trimmed = text.trim()
  const embedded = trimmed.match(EMBEDDED_CUT_TIME_RE)
  const seconds = (embedded ? tryDecodeTimecode(embedded[1]) : null) ?? lineSeconds
  if (seconds == null) return null
  return { kind: 'cut', seconds, reason: cutReason(trimmed, embedded), text }
}

// Stable sort by time; entries at the same second keep their order.
export function orderEntries(entries: TimelineEntry[]): TimelineEntry[] {
  return entries
    .map((e, i) => ({ e, i }))
    .sort((a, b) => a.e.seconds - b.e.seconds || a.i - b.i)
    .map((x) => x.e)
}

export function formatTimelineEntry(entry: TimelineEntry): string {
  const tc = encodeTimecode(entry.seconds)
  if (entry.kind === 'cut') {
    if (entry.text != null) return `${tc}: ${entry.text}`
    return entry.reason ? `${tc}: CUT - ${entry.reason}` : `${tc}: CUT`
  }
  return `${tc}: ${entry.text}`
}

export function serializeTimeline(entries: TimelineEntry[]): string {
  return entries.map(formatTimelineEntry).join('\n')
}

/**
 * Reads persisted timeline text back into typed entries.
 *
 * `HH:MM:SS: text` lines become annotations unless the text starts with "cut",
 * in which case they become cut markers placed at the timecode embedded after
 * the cut token, or at the line's own timestamp when there is none. Lines
 * without a leading timestamp are only accepted as cut markers carrying an
 * embedded timecode (`CUT: 00:01:02: reason`). Anything else is skipped with a
 * warning.
 */
export function parseTimeline(text: string): ParsedTimeline {
  const entries: TimelineEntry[] = []
  const warnings: string[] = []
  for (const rawLine of String(text || '').split('\n')) {
    const line = rawLine.trim()
    if (!line) continue

    const m = line.match(LINE_RE)
    const lineSeconds = m ? tryDecodeTimecode(m[1]) : null
    if (m && lineSeconds != null) {
      const body = m[2]
      const cut = isCutText(body) ? cutMarkerFromText(lineSeconds, body) : null
      if (cut) {
        entries.push(cut)
      } else {
        entries.push({ kind: 'annotation', seconds: lineSeconds, text: body })
      }
      continue
    }

    if (isCutText(line)) {
      const cut = cutMarkerFromText(null, line)
      if (!cut) {
        warnings.push(`Could not parse cut timestamp from line: ${line}`)
        continue
      }
      entries.push(cut)
      continue
    }

    warnings.push(`Skipping unrecognized timeline line: ${line}`)
  }
  // Bare cut lines may sit anywhere in the text; keep the timeline ordered.
  return { entries: orderEntries(entries), warnings }
}
