import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { SendGridAdapter } from '../services/email/sendgrid.adapter';
import { ValidationError } from '../utils/errors';

const sendEmailSchema = z.object({
  receiver_email: z.string().email('receiver_email must be a valid email'),
  subject: z.string().min(1, 'subject is required').max(998),
  body: z.string().min(1, 'body is required'),
  is_html: z.boolean().default(false),
});

export function createEmailRouter(email: SendGridAdapter): Router {
  const router = Router();

  router.post('/send', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = sendEmailSchema.safeParse(req.body);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => i.message);
        throw new ValidationError(issues.join(', '), issues);
      }

      await email.sendEmail({
        to: parsed.data.receiver_email,
        subject: parsed.data.subject,
        body: parsed.data.body,
        isHtml: parsed.data.is_html,
      });
      res.json({ success: true, message: `Email sent to ${parsed.data.receiver_email}` });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
