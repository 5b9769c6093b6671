import fs from 'fs'
import path from 'path'
import { runFfmpeg, type FfmpegRunner } from './runner'

export type SampledFrame = { filePath: string; seconds: number }

// Midpoints of consecutive windows: interval 6 over 20s yields 3, 9, 15.
export function frameSampleTimes(durationSeconds: number, intervalSeconds: number): number[] {
  const interval = Math.max(0.1, intervalSeconds)
  const times: number[] = []
  for (let t = interval / 2; t < durationSeconds; t += interval) times.push(t)
  return times
}

export async function sampleFramesJpeg(opts: {
  inPath: string
  outDir: string
  durationSeconds: number
  intervalSeconds: number
  heightPx?: number
  runner?: FfmpegRunner
}): Promise<SampledFrame[]> {
  const run = opts.runner ?? runFfmpeg
  const height = Math.max(64, Math.round(opts.heightPx ?? 360))
  fs.mkdirSync(opts.outDir, { recursive: true })
  const frames: SampledFrame[] = []
  for (const seconds of frameSampleTimes(opts.durationSeconds, opts.intervalSeconds)) {
    const filePath = path.join(opts.outDir, `frame_${Math.round(seconds * 1000)}.jpg`)
    await run(['-ss', String(seconds), '-i', opts.inPath, '-frames:v', '1', '-vf', `scale=-2:${height}`, '-q:v', '3', filePath])
    frames.push({ filePath, seconds })
  }
  return frames
}
