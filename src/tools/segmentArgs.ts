import { FormatError } from '../core/errors'
import type { Segment } from '../features/cuts/types'
import { decodeTimecode } from '../utils/timecode'

function parseBound(raw: string, arg: string): number {
  const text = raw.trim()
  if (/^\d+(\.\d+)?$/.test(text)) return Number(text)
  if (text.includes(':')) return decodeTimecode(text)
  throw new FormatError(`Invalid segment bound "${raw}" in "${arg}"`)
}

/**
 * Parses `START-END` pairs such as `0-2.5` or `00:00:03-00:00:08`.
 */
export function parseSegmentArg(arg: string): Segment {
  const parts = arg.split('-')
  if (parts.length !== 2) throw new FormatError(`Expected START-END, got "${arg}"`)
  const start = parseBound(parts[0], arg)
  const end = parseBound(parts[1], arg)
  return { start, end }
}

export function parseSegmentArgs(args: readonly string[] | undefined): Segment[] | null {
  if (!args || args.length === 0) return null
  return args.map(parseSegmentArg)
}
