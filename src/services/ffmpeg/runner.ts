import { spawn } from 'child_process'

export type FfmpegRunner = (args: string[]) => Promise<void>

export class FfmpegError extends Error {
  readonly exitCode: number | null
  readonly stderr: string
  constructor(exitCode: number | null, stderr: string) {
    super(`ffmpeg_failed:${exitCode}`)
    this.name = 'FfmpegError'
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

// Keep only the tail of stderr; the useful diagnostics are at the end.
const STDERR_TAIL_CHARS = 4000

export const runFfmpeg: FfmpegRunner = async (args) => {
  await new Promise<void>((resolve, reject) => {
    const p = spawn('ffmpeg', ['-hide_banner', '-y', ...args], { stdio: ['ignore', 'ignore', 'pipe'] })
    let stderr = ''
    p.stderr.on('data', (d) => {
      stderr += String(d)
      if (stderr.length > STDERR_TAIL_CHARS * 2) stderr = stderr.slice(-STDERR_TAIL_CHARS)
    })
    p.on('error', reject)
    p.on('close', (code) => {
      if (code === 0) return resolve()
      reject(new FfmpegError(code, stderr.slice(-STDERR_TAIL_CHARS)))
    })
  })
}
