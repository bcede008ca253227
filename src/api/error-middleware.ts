/**
 * Express glue: async route wrapper, request-body validation and the error
 * handler that turns PeerSyncError into `{error, message}` responses.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { Logger } from '../interfaces';
import { FormatError, errorMessage, isPeerSyncError } from '../lib/errors';
import { ErrorKind } from '../types/constants';

/**
 * Forward rejections of an async handler to the error middleware
 */
export function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    void handler(req, res).catch(next);
  };
}

/**
 * Validate a request body, throwing FormatError with the zod issues
 */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new FormatError(`Invalid request body: ${issues}`);
  }
  return result.data;
}

export function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (isPeerSyncError(err)) {
      logger.debug(`${req.method} ${req.originalUrl} -> ${err.httpStatus} ${err.kind}: ${err.message}`);
      res.status(err.httpStatus).json(err.toJSON());
      return;
    }

    if (err instanceof SyntaxError) {
      res.status(400).json({ error: ErrorKind.FORMAT, message: 'Malformed JSON body' });
      return;
    }

    logger.error(`❌ ${req.method} ${req.originalUrl} failed: ${errorMessage(err)}`);
    res.status(500).json({ error: 'InternalError', message: errorMessage(err) });
  };
}

/**
 * Send a file from disk, settling once the transfer is done
 */
export function sendFile(res: Response, filePath: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    res.sendFile(filePath, (err?: Error) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
