/**
 * Prometheus Metrics
 *
 * Queue depth, job processing, and certificate outcome metrics.
 */

import { createServer, type Server } from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

const queueDepthGauge = new promClient.Gauge({
  name: 'ce_intake_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

const queueMetricsGauge = new promClient.Gauge({
  name: 'ce_intake_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'ce_intake_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'ce_intake_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Certificate Metrics
// ============================================================================

export const certificatesProcessedCounter = new promClient.Counter({
  name: 'ce_intake_certificates_processed_total',
  help: 'Certificates processed, by outcome (verified | rejected | config_incomplete)',
  labelNames: ['outcome'],
  registers: [register],
});

export const validationIssuesCounter = new promClient.Counter({
  name: 'ce_intake_validation_issues_total',
  help: 'Blocking validation issues reported, by kind and field',
  labelNames: ['kind', 'field'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'ce_intake_extraction_duration_seconds',
  help: 'Duration of one parse/validate/normalize run',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * `beforeScrape` runs ahead of each scrape, e.g. to refresh queue gauges.
 */
export function serveMetrics(port: number, beforeScrape?: () => Promise<void>): Server {
  const server = createServer((req, res) => {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end();
      return;
    }

    (beforeScrape ? beforeScrape() : Promise.resolve())
      .then(() => getMetrics())
      .then((body) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.end(body);
      })
      .catch((err: unknown) => {
        logger.error('Metrics scrape failed', err);
        res.statusCode = 500;
        res.end();
      });
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
