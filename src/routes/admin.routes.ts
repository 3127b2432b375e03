import { Router, Request, Response } from 'express';
import { SessionService } from '../services/session.service';

export function createAdminRouter(sessions: SessionService): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      active_threads: sessions.stats().activeThreads,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
