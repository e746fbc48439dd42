import type { ErrorRequestHandler, Request } from 'express';

import { createLogger } from '../logger.js';
import { HttpError, UnauthorizedError } from './errors.js';

const log = createLogger('http');

/**
 * Identity of the caller. Authentication itself happens upstream; this
 * service trusts the X-User-Id header it forwards.
 */
export function currentUser(req: Request): string {
  const userId = req.header('x-user-id')?.trim();
  if (!userId) throw new UnauthorizedError();
  return userId;
}

export const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  if (error instanceof HttpError) {
    res.status(error.status).json(
      error.details === undefined ? { error: error.message } : { error: error.message, details: error.details },
    );
    return;
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }

  log.error(`${req.method} ${req.path} failed:`, error);
  res.status(500).json({ error: 'Internal server error' });
};
