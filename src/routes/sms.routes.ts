import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { TwilioService } from '../services/sms/twilio.service';
import { ValidationError } from '../utils/errors';

const sendSmsSchema = z.object({
  body: z.string().min(1, 'body is required').max(1600),
  number: z.string().regex(/^\+?[1-9]\d{6,14}$/, 'number must be a phone number in E.164 format'),
});

export function createSmsRouter(sms: TwilioService): Router {
  const router = Router();

  router.post('/send', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = sendSmsSchema.safeParse(req.body);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => i.message);
        throw new ValidationError(issues.join(', '), issues);
      }

      const sid = await sms.sendSMS(parsed.data.number, parsed.data.body);
      res.json({ success: true, message_sid: sid });
    } catch (error) {
      next(error);
    }
  });

  router.get('/status/:sid', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const status = await sms.getStatus(req.params.sid);
      res.json({ success: true, ...status });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
