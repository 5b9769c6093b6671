import { spawn } from 'child_process'

export interface MediaProbe {
  durationSeconds(filePath: string): Promise<number>
  hasAudioStream(filePath: string): Promise<boolean>
}

function runFfprobe(args: string[]): Promise<{ code: number | null; out: string; err: string }> {
  return new Promise((resolve, reject) => {
    const p = spawn('ffprobe', ['-v', 'error', ...args], { stdio: ['ignore', 'pipe', 'pipe'] })
    let out = ''
    let err = ''
    p.stdout.on('data', (d) => { out += String(d) })
    p.stderr.on('data', (d) => { err += String(d) })
    p.on('error', reject)
    p.on('close', (code) => resolve({ code, out, err }))
  })
}

type FfprobeStream = { codec_type?: string; duration?: string }
type FfprobeOutput = { streams?: FfprobeStream[]; format?: { duration?: string } }

function finiteOrNull(raw: string | undefined): number | null {
  if (raw == null) return null
  const v = Number(raw)
  return Number.isFinite(v) ? v : null
}

/**
 * Duration of the first video stream, falling back to the container duration,
 * then to 0 when neither is reported.
 */
export async function probeDurationSeconds(filePath: string): Promise<number> {
  const { code, out, err } = await runFfprobe(['-print_format', 'json', '-show_format', '-show_streams', filePath])
  if (code !== 0) throw new Error(`ffprobe_failed:${code}:${err.slice(0, 400)}`)
  const parsed: FfprobeOutput = JSON.parse(out || '{}')
  const streams = Array.isArray(parsed.streams) ? parsed.streams : []
  const video = streams.find((s) => s.codec_type === 'video')
  const fromVideo = finiteOrNull(video?.duration)
  if (fromVideo != null) return fromVideo
  const fromFormat = finiteOrNull(parsed.format?.duration)
  if (fromFormat != null) return fromFormat
  return 0
}

export async function hasAudioStream(filePath: string): Promise<boolean> {
  const { code, out } = await runFfprobe(['-select_streams', 'a:0', '-show_entries', 'stream=index', '-of', 'csv=p=0', filePath])
  if (code !== 0) return false
  return Boolean(out.trim())
}

export const ffprobeMediaProbe: MediaProbe = {
  durationSeconds: probeDurationSeconds,
  hasAudioStream,
}
