import fs from 'fs'
import path from 'path'
import { runFfmpeg, type FfmpegRunner } from './runner'

export function buildConcatList(inputPaths: string[]): string {
  return inputPaths.map((p) => `file '${p.replace(/'/g, "'\\''")}'`).join('\n') + '\n'
}

/**
 * Joins `inputPaths` in order with the concat demuxer and stream copy; the
 * inputs must share codecs and parameters.
 */
export async function concatCopyMp4Local(opts: {
  inputPaths: string[]
  outPath: string
  workDir: string
  runner?: FfmpegRunner
}): Promise<void> {
  if (!opts.inputPaths.length) throw new Error('concat_requires_inputs')
  const run = opts.runner ?? runFfmpeg
  const listPath = path.join(opts.workDir, 'concat_list.txt')
  fs.writeFileSync(listPath, buildConcatList(opts.inputPaths))
  await run(['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', '-movflags', '+faststart', opts.outPath])
}
