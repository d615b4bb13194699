import type { NextFunction, Request, Response } from 'express';
import pino, { LevelWithSilent } from 'pino';
import pinoHttp from 'pino-http';
import { v4 as uuid } from 'uuid';

export const logger = pino({
  level: 'info',
  enabled: process.env.NODE_ENV !== 'test',
});

/** Applies the configured level; child loggers created later inherit it. */
export function setLogLevel(level: LevelWithSilent) {
  logger.level = level;
}

export function withRequestId(req: Request, _res: Response, next: NextFunction) {
  req.id = req.id || uuid();
  next();
}

export const httpLogger = pinoHttp({
  logger,
  genReqId: (req) => req.id,
  autoLogging: { ignore: (req) => (req.url ?? '').includes('/health') },
});
