// Metadata path segments may not contain any of . # $ [ ] /
export function sanitizeKey(key: string): string {
  return String(key).replace(/[.#$[\]/]/g, '_')
}

export function sanitizeFilename(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]+/g, '_').slice(0, 200)
}

export function clipVideoKey(userId: string, clipId: string): string {
  return `videos/${userId}/${clipId}`
}

export function clipVideoPrefix(userId?: string | null): string {
  return userId ? `videos/${userId}/` : 'videos/'
}

export function projectFullKey(userId: string, projectId: string): string {
  return `projects/${userId}/${projectId}/full.mp4`
}

export function projectPreviewKey(userId: string, projectId: string): string {
  return `projects/${userId}/${projectId}/preview.mp4`
}

export function musicFileKey(userId: string, projectId: string, fileName: string): string {
  return `MusicFiles/${userId}/${projectId}/${fileName}`
}

export function videoAnalysisPath(userId: string, clipId: string): string {
  return `video_analysis/${userId}/${sanitizeKey(clipId)}`
}

export function projectPath(userId: string, projectId: string): string {
  return `projects/${userId}/${projectId}`
}
