import fs from 'fs'
import { EmptyResultError, RenderFailedError } from '../../core/errors'
import type { Segment } from '../../features/cuts/types'
import { ffprobeMediaProbe, type MediaProbe } from './probe'
import { FfmpegError, runFfmpeg, type FfmpegRunner } from './runner'

export type RenderMode = 'copy' | 'replace_audio' | 'cut'

export type RenderPlan = { mode: RenderMode; args: string[] }

export type RenderInput = {
  inputPath: string
  outputPath: string
  segments: Segment[]
  totalDurationSeconds: number | null
  audioPath?: string | null
}

const FULL_DURATION_TOLERANCE_SECONDS = 0.001

const VIDEO_ENCODE = ['-c:v', 'libx264', '-preset', 'veryfast', '-crf', '20', '-pix_fmt', 'yuv420p']
const AUDIO_ENCODE = ['-c:a', 'aac', '-b:a', '128k', '-ar', '48000', '-ac', '2']

function fmtSeconds(n: number): string {
  return String(Math.round(n * 1000) / 1000)
}

export function isFullDurationSegment(segments: Segment[], totalDurationSeconds: number | null): boolean {
  if (segments.length !== 1 || totalDurationSeconds == null) return false
  const [only] = segments
  return only.start <= FULL_DURATION_TOLERANCE_SECONDS && only.end >= totalDurationSeconds - FULL_DURATION_TOLERANCE_SECONDS
}

function videoTrim(seg: Segment, i: number): string {
  return `[0:v]trim=start=${fmtSeconds(seg.start)}:end=${fmtSeconds(seg.end)},setpts=PTS-STARTPTS[v${i}]`
}

function audioTrim(seg: Segment, i: number): string {
  return `[0:a]atrim=start=${fmtSeconds(seg.start)}:end=${fmtSeconds(seg.end)},asetpts=PTS-STARTPTS[a${i}]`
}

/**
 * Builds the ffmpeg arguments for one render. Segments are concatenated in the
 * order given.
 */
export function planRender(opts: RenderInput & { hasSourceAudio: boolean }): RenderPlan {
  const { segments } = opts
  if (!segments.length) throw new EmptyResultError()

  if (!opts.audioPath && isFullDurationSegment(segments, opts.totalDurationSeconds)) {
    return {
      mode: 'copy',
      args: ['-i', opts.inputPath, '-c', 'copy', '-movflags', '+faststart', opts.outputPath],
    }
  }

  const n = segments.length
  if (opts.audioPath) {
    const parts = segments.map(videoTrim)
    const concatInputs = segments.map((_s, i) => `[v${i}]`).join('')
    const filter = `${parts.join(';')};${concatInputs}concat=n=${n}:v=1:a=0[v]`
    return {
      mode: 'replace_audio',
      args: [
        '-i', opts.inputPath,
        '-i', opts.audioPath,
        '-filter_complex', filter,
        '-map', '[v]',
        '-map', '1:a:0',
        ...VIDEO_ENCODE,
        ...AUDIO_ENCODE,
        '-shortest',
        '-movflags', '+faststart',
        opts.outputPath,
      ],
    }
  }

  const parts: string[] = []
  const concatInputs: string[] = []
  segments.forEach((seg, i) => {
    parts.push(videoTrim(seg, i))
    if (opts.hasSourceAudio) {
      parts.push(audioTrim(seg, i))
      concatInputs.push(`[v${i}]`, `[a${i}]`)
    } else {
      concatInputs.push(`[v${i}]`)
    }
  })
  const concat = opts.hasSourceAudio
    ? `${concatInputs.join('')}concat=n=${n}:v=1:a=1[v][a]`
    : `${concatInputs.join('')}concat=n=${n}:v=1:a=0[v]`
  const filter = `${parts.join(';')};${concat}`
  const args = ['-i', opts.inputPath, '-filter_complex', filter, '-map', '[v]']
  if (opts.hasSourceAudio) args.push('-map', '[a]')
  args.push(...VIDEO_ENCODE)
  if (opts.hasSourceAudio) args.push(...AUDIO_ENCODE)
  args.push('-movflags', '+faststart', opts.outputPath)
  return { mode: 'cut', args }
}

export type RenderDeps = { runner?: FfmpegRunner; probe?: MediaProbe }

/**
 * Runs one render. Any encoder failure surfaces as RenderFailedError and the
 * partial output file is removed.
 */
export async function renderKeepList(input: RenderInput, deps: RenderDeps = {}): Promise<RenderPlan> {
  if (!input.segments.length) throw new EmptyResultError()
  const run = deps.runner ?? runFfmpeg
  const probe = deps.probe ?? ffprobeMediaProbe

  const hasSourceAudio = input.audioPath ? false : await probe.hasAudioStream(input.inputPath)
  const plan = planRender({ ...input, hasSourceAudio })
  try {
    await run(plan.args)
  } catch (err) {
    fs.rmSync(input.outputPath, { force: true })
    if (err instanceof FfmpegError) {
      throw new RenderFailedError(`Encoder failed (exit ${err.exitCode}) during ${plan.mode} render.`, err.stderr)
    }
    throw new RenderFailedError(`Encoder could not be started: ${err instanceof Error ? err.message : String(err)}`)
  }
  return plan
}
