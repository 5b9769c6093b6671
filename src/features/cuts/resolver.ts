import { EmptyResultError } from '../../core/errors'
import { parseTimeline } from '../timeline/format'
import type { TimelineEntry } from '../timeline/types'
import type { ResolvedKeepList, Segment } from './types'

// Every cut removes this much material starting at the cut point.
export const CUT_EXCISION_SECONDS = 1.0

export function cutPointsFromEntries(entries: TimelineEntry[]): number[] {
  const points = new Set<number>()
  for (const e of entries) {
    if (e.kind === 'cut') points.add(e.seconds)
  }
  return Array.from(points).sort((a, b) => a - b)
}

/**
 * Turns cut points into the segments between them. Material from each cut point
 * up to one second later is dropped.
 */
export function keepListFromCutPoints(cutPoints: number[], totalDurationSeconds: number): Segment[] {
  const sorted = Array.from(new Set(cutPoints)).sort((a, b) => a - b)
  const segments: Segment[] = []
  let cursor = 0
  for (const t of sorted) {
    if (cursor >= totalDurationSeconds) break
    // Cut points past the end only trim the tail.
    if (t > cursor) segments.push({ start: cursor, end: Math.min(t, totalDurationSeconds) })
    cursor = t + CUT_EXCISION_SECONDS
  }
  if (cursor < totalDurationSeconds) segments.push({ start: cursor, end: totalDurationSeconds })
  return segments
}

export type TimelineSource = { entries: TimelineEntry[] } | { text: string }

export type ResolveKeepListInput = {
  // Present (even empty) means explicit mode.
  explicit?: Segment[] | null
  timeline: TimelineSource
  totalDurationSeconds?: number | null
  // Called only in derived mode when the duration is not already known.
  probeTotalDuration: () => Promise<number>
}

export async function resolveKeepList(input: ResolveKeepListInput): Promise<ResolvedKeepList> {
  const known = input.totalDurationSeconds ?? null

  if (input.explicit != null) {
    if (!input.explicit.length) throw new EmptyResultError()
    return { source: 'explicit', segments: input.explicit.map((s) => ({ start: s.start, end: s.end })), totalDurationSeconds: known, warnings: [] }
  }

  const warnings: string[] = []
  let entries: TimelineEntry[]
  if ('entries' in input.timeline) {
    entries = input.timeline.entries
  } else {
    const parsed = parseTimeline(input.timeline.text)
    entries = parsed.entries
    for (const w of parsed.warnings) {
      console.warn('timeline_line_skipped', w)
      warnings.push(w)
    }
  }

  const totalDurationSeconds = known ?? (await input.probeTotalDuration())
  const segments = keepListFromCutPoints(cutPointsFromEntries(entries), totalDurationSeconds)
  if (!segments.length) throw new EmptyResultError('Cut markers leave no segments to keep for rendering.')
  return { source: 'derived', segments, totalDurationSeconds, warnings }
}
