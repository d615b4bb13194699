import rateLimit from 'express-rate-limit';
import type { Request } from 'express';

/** Limits per (userId in body, client IP) pair; mount after the JSON body parser. */
export function perUserIpLimiter(options?: { windowMs?: number; max?: number; standardHeaders?: boolean; legacyHeaders?: boolean; }) {
  return rateLimit({
    windowMs: options?.windowMs ?? 60_000,
    limit: options?.max ?? 60,
    standardHeaders: options?.standardHeaders ?? true,
    legacyHeaders: options?.legacyHeaders ?? false,
    keyGenerator: (req: Request) => {
      const uid = typeof req.body?.userId === 'string' ? req.body.userId : '';
      return `${uid}::${req.ip ?? ''}`;
    },
  });
}
