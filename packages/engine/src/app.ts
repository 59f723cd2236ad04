/**
 * RelayPost Service
 *
 * Bootstrap + lifecycle management.
 *
 * Lifecycle:
 * - On startup: prepare the archive, start the HTTP server
 * - On shutdown: stop taking units, flush every pending batch, wait for the
 *   resulting workflows to finish, then close connections
 */

// Load environment variables from .env file
import 'dotenv/config';

import express from 'express';
import type { Express } from 'express';
import { Pool } from 'pg';

import { AggregationBuffer } from './aggregation/buffer.js';
import { InMemoryWorkflowArchive } from './archive/archive.js';
import type { WorkflowArchive } from './archive/archive.js';
import { PostgresWorkflowArchive, poolClient } from './archive/postgres.js';
import { HttpCapabilities } from './capabilities/http-capabilities.js';
import type { PipelineCapabilities } from './capabilities/types.js';
import { loadConfigFromEnv } from './config/pipeline-config.js';
import type { ServiceConfig } from './config/pipeline-config.js';
import { createRoutes, errorHandler } from './http/routes.js';
import { ConsoleMetrics, NoOpMetrics } from './observability/metrics.js';
import type { PipelineMetrics } from './observability/metrics.js';
import type { UserBatch } from './units/types.js';
import { createLogger } from './utils/logger.js';
import type { Logger, LogSink } from './utils/logger.js';
import { PipelineEngine } from './workflows/engine.js';
import type { EngineEvent } from './workflows/engine.js';
import { UserLanes } from './workflows/user-lanes.js';

/**
 * Collaborators that replace the ones built from config.
 */
export interface ServiceOverrides {
  capabilities?: PipelineCapabilities;
  archive?: WorkflowArchive;
  metrics?: PipelineMetrics;
  logSink?: LogSink;
}

// =============================================================================
// SERVICE APPLICATION
// =============================================================================

export class RelayPostService {
  private config: ServiceConfig;
  private logger: Logger;
  private app: Express;
  private pool?: Pool;
  private archive: WorkflowArchive;
  private engine: PipelineEngine;
  private buffer: AggregationBuffer;
  private lanes = new UserLanes();
  private inFlight: Set<Promise<void>> = new Set();
  private server?: ReturnType<Express['listen']>;
  private shutdownPromise?: Promise<void>;

  constructor(config: ServiceConfig, overrides: ServiceOverrides = {}) {
    this.config = config;
    this.logger = createLogger({ level: config.logLevel, sink: overrides.logSink });
    this.app = express();

    const metrics = overrides.metrics ?? (config.consoleMetrics ? new ConsoleMetrics() : new NoOpMetrics());

    if (overrides.archive) {
      this.archive = overrides.archive;
    } else if (config.databaseUrl) {
      this.pool = new Pool({ connectionString: config.databaseUrl });
      this.archive = new PostgresWorkflowArchive(poolClient(this.pool));
    } else {
      this.archive = new InMemoryWorkflowArchive();
    }

    const http = new HttpCapabilities({ baseUrl: config.capabilityBaseUrl });
    const capabilities = overrides.capabilities ?? {
      analyzer: http,
      drafter: http,
      mediaUploader: http,
      publisher: http,
      notifier: http,
    };

    this.engine = new PipelineEngine({
      capabilities,
      config: config.pipeline,
      logger: this.logger,
      metrics,
      archive: this.archive,
    });

    this.buffer = new AggregationBuffer({
      debounceWindowSeconds: config.pipeline.debounceWindowSeconds,
      onFlush: (batch) => this.dispatch(batch),
      logger: this.logger,
      metrics,
    });

    this.engine.onEvent((event) => this.logEvent(event));
  }

  /**
   * Start the service.
   *
   * 1. Prepare the archive
   * 2. Start HTTP server
   */
  async start(): Promise<void> {
    this.logger.info({}, 'Starting RelayPost...');

    if (this.archive instanceof PostgresWorkflowArchive) {
      await this.archive.ensureSchema();
      this.logger.info({}, 'Workflow archive schema ready');
    } else {
      this.logger.warn({}, 'No DATABASE_URL configured - workflow archive is in memory');
    }

    this.logger.info(
      {
        debounceWindowSeconds: this.config.pipeline.debounceWindowSeconds,
        maxRetriesPerStep: this.config.pipeline.maxRetriesPerStep,
        mediaUploadFailurePolicy: this.config.pipeline.mediaUploadFailurePolicy,
        workflowDeadlineMs: this.engine.workflowDeadlineMs,
      },
      'Pipeline configured'
    );

    this.app.use(express.json({ limit: '10mb' }));
    this.app.use(
      createRoutes({
        buffer: this.buffer,
        engine: this.engine,
        archive: this.archive,
        logger: this.logger,
      })
    );
    this.app.use(errorHandler(this.logger));

    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(
          { port: this.port(), host: this.config.host },
          'HTTP server started'
        );
        resolve();
      });
    });

    this.logger.info({}, 'RelayPost started successfully');
  }

  /**
   * Bound port, or null before start.
   */
  port(): number | null {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : null;
  }

  /**
   * Stop the service. Pending batches are flushed and run to completion.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping RelayPost...');

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      this.logger.info({}, 'HTTP server stopped');
    }

    const flushed = this.buffer.close();
    this.logger.info({ flushed, inFlight: this.inFlight.size }, 'Draining workflows');
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }

    if (this.pool) {
      await this.pool.end();
      this.logger.info({}, 'Database connections closed');
    }

    this.logger.info({}, 'RelayPost stopped');
  }

  // ===========================================================================
  // PRIVATE: Batch Dispatch
  // ===========================================================================

  /**
   * Runs the batch in its user's lane; tracked until it settles.
   */
  private dispatch(batch: UserBatch): void {
    const run = this.lanes
      .runExclusive(batch.userId, batch.batchId, () => this.engine.run(batch))
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error({ userId: batch.userId, batchId: batch.batchId, error }, 'Workflow execution failed');
        }
      )
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  private logEvent(event: EngineEvent): void {
    const ctx = { workflowId: event.workflowId };

    switch (event.type) {
      case 'WORKFLOW_STARTED':
        this.logger.info({ ...ctx, userId: event.userId, units: event.units }, 'Workflow started');
        break;
      case 'STEP_STARTED':
        this.logger.debug({ ...ctx, step: event.step, attempt: event.attempt }, 'Step started');
        break;
      case 'STEP_COMPLETED':
        this.logger.info({ ...ctx, step: event.step, durationMs: event.durationMs }, 'Step completed');
        break;
      case 'STEP_SKIPPED':
        this.logger.info({ ...ctx, step: event.step }, 'Step skipped');
        break;
      case 'NOTIFICATION_FAILED':
        this.logger.warn({ ...ctx, code: event.code }, 'Notification failed');
        break;
      case 'WORKFLOW_SUCCEEDED':
        this.logger.info({ ...ctx, url: event.url, durationMs: event.durationMs }, 'Workflow succeeded');
        break;
      // Retries, degradation and aborts are logged by the engine itself
      case 'STEP_RETRY':
      case 'STEP_DEGRADED':
      case 'WORKFLOW_ABORTED':
      case 'NOTIFICATION_SENT':
        break;
    }
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const logger = createLogger({ level: config.logLevel });
  const service = new RelayPostService(config);
  await service.start();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    await service.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
