// A half-open range of source seconds to retain, 0 <= start < end.
export type Segment = { start: number; end: number }

export type KeepListSource = 'explicit' | 'derived'

export type ResolvedKeepList = {
  source: KeepListSource
  segments: Segment[]
  // Known only when the list was derived (or a duration was supplied).
  totalDurationSeconds: number | null
  warnings: string[]
}
