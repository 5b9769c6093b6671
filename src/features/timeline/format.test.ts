import { describe, it, expect } from 'vitest'
import { formatTimelineEntry, isCutText, parseTimeline, serializeTimeline } from './format'
import type { TimelineEntry } from './types'

const entries: TimelineEntry[] = [
  { kind: 'annotation', seconds: 2, text: 'a dog runs' },
  { kind: 'cut', seconds: 13, reason: '' },
  { kind: 'cut', seconds: 20, reason: 'too long' },
]

describe('serializeTimeline', () => {
  it('writes one HH:MM:SS line per entry', () => {
    expect(serializeTimeline(entries)).toBe('00:00:02: a dog runs\n00:00:13: CUT\n00:00:20: CUT - too long')
  })

  it('formats a single entry', () => {
    expect(formatTimelineEntry({ kind: 'annotation', seconds: 3725, text: 'x' })).toBe('01:02:05: x')
  })
})

describe('parseTimeline', () => {
  it('reads back what serializeTimeline writes', () => {
    const text = serializeTimeline(entries)
    const parsed = parseTimeline(text)
    expect(parsed.entries).toEqual([
      { kind: 'annotation', seconds: 2, text: 'a dog runs' },
      { kind: 'cut', seconds: 13, reason: '', text: 'CUT' },
      { kind: 'cut', seconds: 20, reason: 'too long', text: 'CUT - too long' },
    ])
    expect(parsed.warnings).toEqual([])
    expect(serializeTimeline(parsed.entries)).toBe(text)
  })

  it('keeps colons inside annotation text', () => {
    expect(parseTimeline('00:00:03: note: hi').entries).toEqual([{ kind: 'annotation', seconds: 3, text: 'note: hi' }])
  })

  it('treats any text starting with cut as a cut marker, case-insensitively', () => {
    expect(parseTimeline('00:00:04: Cut here').entries).toEqual([{ kind: 'cut', seconds: 4, reason: 'here', text: 'Cut here' }])
  })

  it('prefers a timecode embedded after the cut token', () => {
    expect(parseTimeline('00:00:05: cut 00:00:07 jump').entries).toEqual([{ kind: 'cut', seconds: 7, reason: 'jump', text: 'cut 00:00:07 jump' }])
  })

  it('accepts bare cut lines that carry a timecode and keeps the result ordered', () => {
    const parsed = parseTimeline('00:02:00: later\nCUT: 00:01:02: reason')
    expect(parsed.entries).toEqual([
      { kind: 'cut', seconds: 62, reason: 'reason', text: 'CUT: 00:01:02: reason' },
      { kind: 'annotation', seconds: 120, text: 'later' },
    ])
  })

  it('strips only one separator after the cut token', () => {
    expect(parseTimeline('00:00:04: cut: -5 degrees').entries).toEqual([
      { kind: 'cut', seconds: 4, reason: '-5 degrees', text: 'cut: -5 degrees' },
    ])
  })

  it('keeps a caption that merely starts with cut whole', () => {
    const parsed = parseTimeline('00:00:03: Cutting onions on a board')
    expect(parsed.entries).toEqual([
      { kind: 'cut', seconds: 3, reason: 'Cutting onions on a board', text: 'Cutting onions on a board' },
    ])
    expect(serializeTimeline(parsed.entries)).toBe('00:00:03: Cutting onions on a board')
  })

  it('writes a bare cut line back at its embedded time', () => {
    const parsed = parseTimeline('CUT: 00:01:02: reason')
    expect(serializeTimeline(parsed.entries)).toBe('00:01:02: CUT: 00:01:02: reason')
    expect(parseTimeline(serializeTimeline(parsed.entries)).entries).toEqual(parsed.entries)
  })

  it('skips unparseable lines with a warning', () => {
    const parsed = parseTimeline('CUT here\nrandom text\n\n00:00:01: ok')
    expect(parsed.entries).toEqual([{ kind: 'annotation', seconds: 1, text: 'ok' }])
    expect(parsed.warnings).toEqual([
      'Could not parse cut timestamp from line: CUT here',
      'Skipping unrecognized timeline line: random text',
    ])
  })

  it('returns nothing for empty text', () => {
    expect(parseTimeline('')).toEqual({ entries: [], warnings: [] })
  })
})

describe('isCutText', () => {
  it('ignores leading whitespace and case', () => {
    expect(isCutText('  CUT')).toBe(true)
    expect(isCutText('cutting board')).toBe(true)
    expect(isCutText('a cut')).toBe(false)
  })
})
