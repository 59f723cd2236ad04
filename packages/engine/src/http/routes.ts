/**
 * HTTP API Routes
 *
 * Thin controllers: validate input, hand units to the buffer, read workflow
 * state. No pipeline logic here.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';

import { BufferClosedError } from '../aggregation/buffer.js';
import type { AggregationBuffer } from '../aggregation/buffer.js';
import type { WorkflowArchive } from '../archive/archive.js';
import { ValidationError } from '../errors/taxonomy.js';
import { parseInboundEvent, toInboundUnit } from '../units/inbound.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineEngine } from '../workflows/engine.js';
import type { WorkflowState } from '../workflows/types.js';

// =============================================================================
// RESPONSE TYPES
// =============================================================================

interface UnitAcceptedResponse {
  unit_id: string;
  batch_id: string;
  position: number;
}

interface WorkflowResponse {
  id: string;
  user_id: string;
  batch_id: string;
  status: string;
  state: string;
  step: string | null;
  units: number;
  started_at: number;
  finished_at: number | null;
  notification: string;
  history: Array<{
    step: string;
    outcome: string;
    attempt: number;
    duration_ms: number;
    error_code?: string;
  }>;
  post_url?: string;
  error?: {
    step: string;
    reason: string;
    code: string;
    message: string;
  };
}

export interface RouteDependencies {
  buffer: AggregationBuffer;
  engine: PipelineEngine;
  archive: WorkflowArchive;
  logger: Logger;
}

const MAX_LIST_LIMIT = 100;

// =============================================================================
// ROUTE FACTORY
// =============================================================================

export function createRoutes({ buffer, engine, archive, logger }: RouteDependencies): Router {
  const router = Router();

  // ===========================================================================
  // POST /units
  // Accept one inbound unit into the user's pending batch
  // ===========================================================================
  router.post('/units', (req: Request, res: Response, next: NextFunction) => {
    try {
      const event = parseInboundEvent(req.body);
      const unit = toInboundUnit(event);
      const receipt = buffer.addUnit(unit);

      logger.debug(
        { userId: unit.userId, unitId: unit.id, batchId: receipt.batchId, position: receipt.position },
        'Unit accepted'
      );

      const body: UnitAcceptedResponse = {
        unit_id: unit.id,
        batch_id: receipt.batchId,
        position: receipt.position,
      };
      res.status(202).json(body);
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // GET /workflows/:id
  // Running workflows come from the engine, finished ones from the archive
  // ===========================================================================
  router.get('/workflows/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const workflow = engine.getWorkflow(req.params.id) ?? (await archive.load(req.params.id));

      if (!workflow) {
        res.status(404).json({ error: 'Workflow not found' });
        return;
      }

      res.json(toWorkflowResponse(workflow));
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // GET /users/:userId/workflows
  // Finished workflows of one user, most recent first
  // ===========================================================================
  router.get('/users/:userId/workflows', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = parseLimit(req.query.limit);
      const workflows = await archive.findByUser(req.params.userId, limit);
      res.json({ workflows: workflows.map(toWorkflowResponse) });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // GET /health
  // ===========================================================================
  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      pending_users: buffer.pendingUsers().length,
      active_workflows: engine.activeCount(),
      timestamp: Date.now(),
    });
  });

  return router;
}

// =============================================================================
// HELPERS
// =============================================================================

function parseLimit(raw: unknown): number {
  if (raw === undefined) return 50;
  const value = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(value) || value < 1 || value > MAX_LIST_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, 'limit');
  }
  return value;
}

export function toWorkflowResponse(workflow: WorkflowState): WorkflowResponse {
  const response: WorkflowResponse = {
    id: workflow.workflowId,
    user_id: workflow.sourceBatch.userId,
    batch_id: workflow.sourceBatch.batchId,
    status: workflow.status,
    state: workflow.currentState,
    step: workflow.currentStep,
    units: workflow.sourceBatch.units.length,
    started_at: workflow.startedAt,
    finished_at: workflow.finishedAt ?? null,
    notification: workflow.notification,
    history: workflow.history.map((entry) => ({
      step: entry.stepName,
      outcome: entry.outcome,
      attempt: entry.attempt,
      duration_ms: entry.finishedAt - entry.startedAt,
      ...(entry.error ? { error_code: entry.error.code } : {}),
    })),
  };

  if (workflow.artifacts.locator) {
    response.post_url = workflow.artifacts.locator.url;
  }

  if (workflow.failure) {
    response.error = {
      step: workflow.failure.step,
      reason: workflow.failure.reason,
      code: workflow.failure.code,
      message: workflow.failure.message,
    };
  }

  return response;
}

// =============================================================================
// ERROR HANDLER
// =============================================================================

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(400).json({ error: err.message, ...(err.field ? { field: err.field } : {}) });
      return;
    }

    if (err instanceof BufferClosedError) {
      res.status(503).json({ error: 'Not accepting new units' });
      return;
    }

    // express.json() rejects unparseable bodies with a 400-typed error
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({ error: 'Request body is not valid JSON' });
      return;
    }

    logger.error({ error: err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}
