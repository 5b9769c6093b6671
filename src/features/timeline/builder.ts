import { tryDecodeTimecode } from '../../utils/timecode'
import { cutMarkerFromText, isCutText, orderEntries } from './format'
import type { BuiltTimeline, Clip, ClipAnnotation, ClipPlacement, TimelineEntry } from './types'

export function timelineEntryFor(seconds: number, text: string): TimelineEntry {
  const cut = isCutText(text) ? cutMarkerFromText(seconds, text) : null
  return cut ?? { kind: 'annotation', seconds, text }
}

/**
 * Merges clips, in the order given, into one timeline. Each clip's annotations
 * are shifted by the summed durations of the clips before it. A cut annotation
 * carrying its own timecode is placed there, as `parseTimeline` would place it,
 * so the result is re-sorted by time.
 */
export function buildTimeline(clips: Clip[]): BuiltTimeline {
  const entries: TimelineEntry[] = []
  const placements: ClipPlacement[] = []
  let offset = 0
  for (const clip of clips) {
    // Array.prototype.sort is stable, so equal timestamps keep insertion order.
    const sorted = [...clip.annotations].sort((a, b) => a.seconds - b.seconds)
    for (const a of sorted) entries.push(timelineEntryFor(offset + a.seconds, a.text))
    const durationSeconds = Math.max(0, clip.durationSeconds)
    placements.push({ clipId: clip.id, offsetSeconds: offset, durationSeconds })
    offset += durationSeconds
  }
  return { entries: orderEntries(entries), placements, totalDurationSeconds: offset }
}

export function clipFromFrameDescriptions(
  id: string,
  frameDescriptions: Record<string, string>,
  durationSeconds: number
): { clip: Clip; warnings: string[] } {
  const annotations: ClipAnnotation[] = []
  const warnings: string[] = []
  for (const [ts, text] of Object.entries(frameDescriptions)) {
    const seconds = tryDecodeTimecode(ts)
    if (seconds == null) {
      warnings.push(`Skipping frame description with invalid timestamp ${ts} in ${id}`)
      continue
    }
    annotations.push({ seconds, text })
  }
  return { clip: { id, annotations, durationSeconds }, warnings }
}

// Adds cut markers, keeping the timeline ordered. A marker lands after any
// existing entry with the same time.
export function insertCutMarkers(entries: TimelineEntry[], cuts: Array<{ seconds: number; reason: string }>): TimelineEntry[] {
  const markers: TimelineEntry[] = cuts.map((c) => ({ kind: 'cut', seconds: c.seconds, reason: c.reason }))
  return orderEntries([...entries, ...markers])
}
