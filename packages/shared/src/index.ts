/**
 * Shared Package - Main Export
 */

// Context
export { contextForDocument, runWithContextAsync, type JobContext } from './context';

// Logger
export { logger, type LogContext, type LogLevel } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractCertificateJob,
  type SubmitBrokerJob,
  type ReviewRequiredJob,
  createQueue,
  createWorker,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  jobDurationHistogram,
  jobsProcessedCounter,
  certificatesProcessedCounter,
  validationIssuesCounter,
  extractionDurationHistogram,
  reportQueueMetrics,
  serveMetrics,
} from './metrics';

// Schemas
export { validateBrokerPayload, type ValidationResult } from './schemas';

// Certificate pipeline
export * from './certificate';
