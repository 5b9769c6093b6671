import { Router } from 'express'
import { z } from 'zod'
import type { ProjectService } from '../features/projects/service'

const idSchema = z.string().trim().min(1).max(255)

const createProjectSchema = z.object({
  user_id: idSchema,
  project_id: idSchema,
  video_ids: z.array(idSchema),
})

const renderProjectSchema = z.object({
  user_id: idSchema,
  project_id: idSchema,
  segments_to_keep: z.array(z.tuple([z.number().nonnegative(), z.number().nonnegative()])).nullable().optional(),
  audio_file_name: z.string().trim().min(1).max(255).nullable().optional(),
})

const addCutsSchema = z.object({
  user_id: idSchema,
  project_id: idSchema,
  cuts: z.array(z.object({ time: z.number().nonnegative(), reason: z.string().max(500).default('') })).min(1),
})

export function createProjectsRouter(projects: ProjectService): Router {
  const router = Router()

  router.post('/api/projects', async (req, res, next) => {
    try {
      const body = createProjectSchema.parse(req.body || {})
      const result = await projects.createProject({ userId: body.user_id, projectId: body.project_id, videoIds: body.video_ids })
      res.status(201).json(result)
    } catch (err) {
      next(err)
    }
  })

  router.post('/api/projects/render', async (req, res, next) => {
    try {
      const body = renderProjectSchema.parse(req.body || {})
      const result = await projects.renderProject({
        userId: body.user_id,
        projectId: body.project_id,
        segmentsToKeep: body.segments_to_keep ? body.segments_to_keep.map(([start, end]) => ({ start, end })) : null,
        audioFileName: body.audio_file_name ?? null,
      })
      res.json(result)
    } catch (err) {
      next(err)
    }
  })

  router.post('/api/projects/cuts', async (req, res, next) => {
    try {
      const body = addCutsSchema.parse(req.body || {})
      const entries = await projects.addCutMarkers(body.user_id, body.project_id, body.cuts)
      res.json({ projectId: body.project_id, entries })
    } catch (err) {
      next(err)
    }
  })

  router.get('/api/projects/:userId/:projectId/summary', async (req, res, next) => {
    try {
      const summary = await projects.getProjectSummary(String(req.params.userId), String(req.params.projectId))
      res.json(summary)
    } catch (err) {
      next(err)
    }
  })

  return router
}
