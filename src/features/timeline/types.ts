export type AnnotationEntry = { kind: 'annotation'; seconds: number; text: string }

// `text` holds the annotation a marker was read from and is written back as is;
// markers added directly carry only a reason.
export type CutMarkerEntry = { kind: 'cut'; seconds: number; reason: string; text?: string }

export type TimelineEntry = AnnotationEntry | CutMarkerEntry

export type ClipAnnotation = { seconds: number; text: string }

// One analyzed source clip. Annotation times are relative to the clip start.
export type Clip = {
  id: string
  annotations: ClipAnnotation[]
  durationSeconds: number
}

export type ClipPlacement = { clipId: string; offsetSeconds: number; durationSeconds: number }

export type BuiltTimeline = {
  entries: TimelineEntry[]
  placements: ClipPlacement[]
  totalDurationSeconds: number
}

export type ParsedTimeline = {
  entries: TimelineEntry[]
  warnings: string[]
}
