/**
 * Maps failures to HTTP responses. Bodies are `{ detail }`.
 */

import type { Request, Response } from 'express';
import { ValidationError, errorMessage } from '../utils/errors.js';

const API_KEY_PATTERN = /api[\s_-]?key/i;
const DATABASE_PATTERN = /database|sqlite/i;

export function sendDetail(res: Response, status: number, detail: string): void {
  res.status(status).json({ detail });
}

/**
 * Status and client-facing detail for a failed query.
 */
export function queryFailure(error: unknown): { status: number; detail: string } {
  if (error instanceof ValidationError) {
    return { status: error.status, detail: error.message };
  }

  const message = errorMessage(error);
  if (API_KEY_PATTERN.test(message)) {
    return { status: 503, detail: 'AI service is not available. Please check configuration.' };
  }
  if (DATABASE_PATTERN.test(message)) {
    return { status: 503, detail: 'Database service is not available.' };
  }
  return { status: 500, detail: `Query processing failed: ${message}` };
}

export function methodNotAllowed(allowed: string) {
  return (_req: Request, res: Response): void => {
    res.setHeader('Allow', allowed);
    sendDetail(res, 405, 'Method Not Allowed');
  };
}
