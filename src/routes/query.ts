/**
 * Query Routes
 *
 * POST /api/query answers a question about the course materials:
 * 1. Validate the body
 * 2. Create a session when the client did not send one
 * 3. Run the course assistant and return its answer and sources
 *
 * GET /api/courses reports what is indexed.
 */

import { Router, type Request, type Response } from 'express';
import type { CourseAssistant } from '../orchestrator/index.js';
import type { CourseStore } from '../services/courses/types.js';
import type { SessionStore } from '../services/sessions/types.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { createLogger, createRequestId, withLogContext } from '../utils/observability/index.js';
import { methodNotAllowed, queryFailure, sendDetail } from './errors.js';

const logger = createLogger({ domain: 'http' });

export interface QueryRouteDeps {
  assistant: CourseAssistant;
  courseStore: CourseStore;
  sessionStore: SessionStore;
  maxQueryLength: number;
}

export interface QueryBody {
  query: string;
  sessionId?: string;
}

/**
 * Validate a raw request body.
 *
 * @throws ValidationError 422 when `query` is missing or not a string,
 *   400 when it is blank or too long
 */
export function parseQueryBody(body: unknown, maxQueryLength: number): QueryBody {
  const fields = new Map<string, unknown>(
    typeof body === 'object' && body !== null ? Object.entries(body) : []
  );

  const query = fields.get('query');
  if (typeof query !== 'string') {
    throw new ValidationError('Field required: query (string)', 422);
  }
  if (!query.trim()) {
    throw new ValidationError('Query cannot be empty');
  }
  if (query.length > maxQueryLength) {
    throw new ValidationError(`Query too long (max ${maxQueryLength} characters)`);
  }

  const sessionId = fields.get('session_id');
  if (sessionId !== undefined && sessionId !== null && typeof sessionId !== 'string') {
    throw new ValidationError('session_id must be a string', 422);
  }

  return typeof sessionId === 'string' && sessionId ? { query, sessionId } : { query };
}

export function createQueryRouter(deps: QueryRouteDeps): Router {
  const router = Router();

  router.post('/api/query', async (req: Request, res: Response) => {
    const requestId = createRequestId();

    await withLogContext({ requestId }, async () => {
      try {
        const body = parseQueryBody(req.body, deps.maxQueryLength);
        const sessionId = body.sessionId ?? (await deps.sessionStore.createSession());

        const controller = new AbortController();
        res.on('close', () => {
          if (!res.writableFinished) controller.abort();
        });

        const result = await withLogContext({ sessionId }, () =>
          deps.assistant.answer(body.query, sessionId, { signal: controller.signal })
        );

        res.json({
          answer: result.answer,
          sources: result.sources,
          session_id: sessionId,
        });
      } catch (error) {
        const { status, detail } = queryFailure(error);
        if (status >= 500) {
          logger.error('query_failed', { status, error: errorMessage(error) });
        } else {
          logger.warn('query_rejected', { status, error: errorMessage(error) });
        }
        if (!res.headersSent) {
          sendDetail(res, status, detail);
        }
      }
    });
  });
  router.all('/api/query', methodNotAllowed('POST'));

  router.get('/api/courses', async (_req: Request, res: Response) => {
    try {
      const titles = await deps.courseStore.listCourseTitles();
      res.json({ total_courses: titles.length, course_titles: titles });
    } catch (error) {
      logger.error('course_stats_failed', { error: errorMessage(error) });
      sendDetail(res, 500, `Failed to load course statistics: ${errorMessage(error)}`);
    }
  });
  router.all('/api/courses', methodNotAllowed('GET'));

  return router;
}
