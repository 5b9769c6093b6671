import { FormatError } from '../core/errors'

const pad2 = (n: number) => String(n).padStart(2, '0')

/**
 * Formats a non-negative offset as `HH:MM:SS`. Fractions are truncated, and hours
 * grow past two digits instead of wrapping at 24.
 */
export function encodeTimecode(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) throw new FormatError(`invalid_seconds:${seconds}`)
  const whole = Math.floor(seconds)
  const hours = Math.floor(whole / 3600)
  const minutes = Math.floor((whole % 3600) / 60)
  const secs = whole % 60
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`
}

/**
 * Parses `SS`, `MM:SS` or `HH:MM:SS` into seconds.
 */
export function decodeTimecode(text: string): number {
  const fields = String(text ?? '').split(':').map((f) => f.trim())
  if (fields.length < 1 || fields.length > 3) throw new FormatError(`invalid_timecode:${text}`)
  const nums: number[] = []
  for (const f of fields) {
    if (!/^\d+$/.test(f)) throw new FormatError(`invalid_timecode:${text}`)
    nums.push(Number(f))
  }
  if (nums.length === 3) return nums[0] * 3600 + nums[1] * 60 + nums[2]
  if (nums.length === 2) return nums[0] * 60 + nums[1]
  return nums[0]
}

export function tryDecodeTimecode(text: string): number | null {
  try {
    return decodeTimecode(text)
  } catch (err) {
    if (err instanceof FormatError) return null
    throw err
  }
}
