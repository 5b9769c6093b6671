import fs from 'fs'
import os from 'os'
import path from 'path'
import { describe, it, expect } from 'vitest'
import { writeRequestLog } from './requestLog'

describe('writeRequestLog', () => {
  it('writes one JSON file named after the sanitized hint', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cutline-test-'))
    try {
      writeRequestLog('render:u1:p 1', { segments: [[0, 2]] }, dir)
      const files = fs.readdirSync(dir)
      expect(files).toHaveLength(1)
      expect(files[0].endsWith('_render_u1_p_1.log')).toBe(true)
      const body = JSON.parse(fs.readFileSync(path.join(dir, files[0]), 'utf8'))
      expect(body.meta.name).toBe('render:u1:p 1')
      expect(body.payload).toEqual({ segments: [[0, 2]] })
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })
})
