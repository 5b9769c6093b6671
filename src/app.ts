import express from 'express';
import type { AppContext } from './context';
import { domainErrorMiddleware, errorMessage } from './core/http';
import { createDebugRouter } from './routes/debug';
import { createProjectsRouter } from './routes/projects';
import { createVideosRouter } from './routes/videos';
import { getVersionInfo } from './utils/version';

export function buildServer(ctx: AppContext): express.Application {
  const app = express();
  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/version', (_req, res) => {
    res.json(getVersionInfo());
  });

  app.use(createVideosRouter(ctx.videoAnalysis));
  app.use(createProjectsRouter(ctx.projects));
  app.use(createDebugRouter(ctx.staging));

  app.use(domainErrorMiddleware);
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('request failed', req.method, req.path, err);
    res.status(500).json({ error: 'internal_error', detail: errorMessage(err) });
  });

  return app;
}
