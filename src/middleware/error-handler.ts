import { Request, Response, NextFunction } from 'express';
import { z } from 'zod/v4';
import { isOrchestratorError, errorMessage } from '../errors.js';

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Maps thrown errors to `{ error, kind }` responses.
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (isOrchestratorError(error)) {
    if (error.status >= 500) {
      console.error(`[HTTP] ${req.method} ${req.originalUrl} failed (${error.kind}): ${error.message}`);
    }
    res.status(error.status).json({ error: error.message, kind: error.kind });
    return;
  }

  if (error instanceof z.ZodError) {
    res.status(400).json({ error: z.prettifyError(error), kind: 'InvalidRequest' });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ error: 'Malformed JSON body', kind: 'InvalidRequest' });
    return;
  }

  console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, error);
  res.status(500).json({ error: errorMessage(error), kind: 'Internal' });
}
