import { Router, Request, Response, NextFunction } from 'express';
import { validateZod } from '../app/Middlewares/validateZod';
import { perUserIpLimiter } from '../app/Middlewares/rateLimiters';
import { CoachMessageInput, coachMessageSchema } from '../app/Validation/requestSchemas';
import { CoachService } from '../services/conversation/coachService';

export type CoachRoutesOptions = { ratePerMinute: number };

export function coachRoutes(coach: CoachService, options: CoachRoutesOptions): Router {
  const r = Router();

  r.post(
    '/messages',
    perUserIpLimiter({ max: options.ratePerMinute }),
    validateZod({ body: coachMessageSchema }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        // validateZod replaced the body with the parsed value
        const { userId, text }: CoachMessageInput = req.body;
        const { reply, text: replyText } = await coach.handleMessage(userId, text);
        if (reply.kind === 'store-unavailable') {
          return res.status(503).json({ reply: replyText, kind: reply.kind });
        }
        return res.status(200).json({ reply: replyText, kind: reply.kind });
      } catch (err) {
        return next(err);
      }
    }
  );

  return r;
}
