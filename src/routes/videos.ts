import { Router } from 'express'
import { z } from 'zod'
import type { VideoAnalysisService } from '../features/video-analysis/service'

const processVideoSchema = z.object({
  user_id: z.string().trim().min(1).max(255),
  video_filename: z.string().trim().min(1).max(512),
})

export function createVideosRouter(videoAnalysis: VideoAnalysisService): Router {
  const router = Router()

  router.post('/api/videos/process', async (req, res, next) => {
    try {
      const body = processVideoSchema.parse(req.body || {})
      const result = await videoAnalysis.processVideo(body.user_id, body.video_filename)
      res.json({ message: 'Video processing completed.', videoId: result.id, userId: result.userId, status: result.status })
    } catch (err) {
      next(err)
    }
  })

  router.get('/api/videos/:userId/:videoFilename/result', async (req, res, next) => {
    try {
      const result = await videoAnalysis.getVideoResult(String(req.params.userId), String(req.params.videoFilename))
      res.json(result)
    } catch (err) {
      next(err)
    }
  })

  router.get('/api/videos', async (req, res, next) => {
    try {
      const userId = typeof req.query.user_id === 'string' && req.query.user_id ? req.query.user_id : null
      const videos = await videoAnalysis.listVideos(userId)
      res.json({ videos })
    } catch (err) {
      next(err)
    }
  })

  return router
}
