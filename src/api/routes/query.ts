/**
 * QueryGate - Query API Routes
 *
 * REST endpoints the agent loop calls to run or dry-run generated SQL.
 * Accepted and rejected statements both answer 200 with an envelope; only a
 * malformed request body is an HTTP error.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import { formatValidationErrors } from '../../config/schema.js';
import type { SqlGuard } from '../../guard/pipeline.js';
import { asyncHandler, badRequest } from '../../server/middleware/errorHandler.js';

// =============================================================================
// Request Schemas
// =============================================================================

const InspectRequestSchema = z.object({
  sql: z.string().min(1, 'sql must not be empty'),
});

const QueryRequestSchema = InspectRequestSchema.extend({
  timeoutMs: z.number().int().positive().optional(),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw badRequest('Invalid request body', formatValidationErrors(result.error));
  }
  return result.data;
}

// =============================================================================
// Router
// =============================================================================

export function createQueryRouter(guard: SqlGuard): Router {
  const router = Router();
  const policy = guard.getPolicy();

  /**
   * POST /api/query
   *
   * Validate, normalize and execute a statement. A caller may shorten the
   * deadline with timeoutMs but never extend it past the configured one.
   * Closing the connection early cancels the query.
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseBody(QueryRequestSchema, req.body);
      const timeoutMs = Math.min(body.timeoutMs ?? policy.queryTimeoutMs, policy.queryTimeoutMs);

      const controller = new AbortController();
      const onClose = (): void => {
        if (!res.writableFinished) {
          controller.abort();
        }
      };
      res.on('close', onClose);

      try {
        const envelope = await guard.run(body.sql, {
          timeoutMs,
          signal: controller.signal,
          requestId: req.requestId,
        });
        req.guardReason = envelope.reason;
        if (!controller.signal.aborted) {
          res.status(200).json(envelope);
        }
      } finally {
        res.off('close', onClose);
      }
    })
  );

  /**
   * POST /api/query/inspect
   *
   * Dry run: the verdict and the normalized SQL, nothing executed.
   */
  router.post('/inspect', (req: Request, res: Response) => {
    const body = parseBody(InspectRequestSchema, req.body);
    const envelope = guard.inspect(body.sql, req.requestId);
    req.guardReason = envelope.reason;
    res.status(200).json(envelope);
  });

  /**
   * GET /api/query/policy
   */
  router.get('/policy', (_req: Request, res: Response) => {
    res.status(200).json({
      row_limit_ceiling: policy.rowLimitCeiling,
      schema_whitelist: policy.schemaWhitelist,
      forbidden_keywords: policy.forbiddenKeywords,
      max_query_length: policy.maxQueryLength,
      query_timeout_ms: policy.queryTimeoutMs,
      database_configured: guard.hasDatabase(),
    });
  });

  return router;
}

export default createQueryRouter;
