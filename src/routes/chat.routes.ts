import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { SessionService } from '../services/session.service';
import { ValidationError } from '../utils/errors';

const chatMessageSchema = z.object({
  thread_id: z.string().trim().min(1, 'thread_id is required').max(200),
  query: z.string().max(5000),
});

export function createChatRouter(sessions: SessionService): Router {
  const router = Router();

  router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => i.message);
        throw new ValidationError(issues.join(', '), issues);
      }

      const result = await sessions.handleTurn(parsed.data.thread_id, parsed.data.query);

      res.json({
        success: true,
        response: result.response,
        thread_id: result.threadId,
        timestamp: result.timestamp,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/thread/:threadId/history', (req: Request, res: Response, next: NextFunction) => {
    try {
      const messages = sessions.getHistory(req.params.threadId);
      res.json({
        success: true,
        thread_id: req.params.threadId,
        message_count: messages.length,
        messages,
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/thread/:threadId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const deleted = await sessions.deleteThread(req.params.threadId);
      res.json({ success: true, deleted });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
