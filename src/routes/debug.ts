import { Router } from 'express'
import { z } from 'zod'
import type { StagingAdapter } from '../services/staging'

const storageExistsSchema = z.object({ path: z.string().trim().min(1).max(1024) })

export function createDebugRouter(staging: StagingAdapter): Router {
  const router = Router()

  router.get('/api/debug/storage-exists', async (req, res, next) => {
    try {
      const { path } = storageExistsSchema.parse(req.query)
      const exists = await staging.exists(path)
      res.json({ path, exists })
    } catch (err) {
      next(err)
    }
  })

  return router
}
