/**
 * Certificate Extractor Worker
 *
 * Consumes extract_certificate jobs and routes each certificate to
 * submit_broker or review_required.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  createWorker,
  createQueue,
  loadPipelineConfig,
  reportQueueMetrics,
  serveMetrics,
  QUEUE_NAMES,
  ConfigIncompleteError,
  jobsProcessedCounter,
  jobDurationHistogram,
  type ExtractCertificateJob,
  type SubmitBrokerJob,
  type ReviewRequiredJob,
} from '@ce-intake/shared';
import { processCertificateJob, type CertificateOutcome } from './lib/process';

const pipelineConfig = loadPipelineConfig();

// Create queues
const submitBrokerQueue = createQueue<SubmitBrokerJob, void>(QUEUE_NAMES.SUBMIT_BROKER);
const reviewRequiredQueue = createQueue<ReviewRequiredJob, void>(QUEUE_NAMES.REVIEW_REQUIRED);
const extractCertificateQueue = createQueue<ExtractCertificateJob, CertificateOutcome['status']>(
  QUEUE_NAMES.EXTRACT_CERTIFICATE
);

async function processExtractCertificate(
  job: Job<ExtractCertificateJob, CertificateOutcome['status']>
): Promise<CertificateOutcome['status']> {
  const startTime = Date.now();

  logger.info('Processing extract_certificate', {
    jobId: job.id,
    document_id: job.data.document.document_id,
    segment_count: job.data.segments.length,
    attempt: job.attemptsMade + 1,
  });

  try {
    const outcome = await processCertificateJob(job.data, {
      submitBroker: submitBrokerQueue,
      reviewRequired: reviewRequiredQueue,
      pipelineConfig,
      brokerContext: config.broker,
    });

    const duration = (Date.now() - startTime) / 1000;
    jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_CERTIFICATE, status: 'success' });
    jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_CERTIFICATE, status: 'success' }, duration);
    return outcome.status;
  } catch (error) {
    jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_CERTIFICATE, status: 'failed' });
    if (error instanceof ConfigIncompleteError) {
      // Deployment defect: no retry
      job.discard();
    }
    throw error;
  }
}

// Create and start the worker
const worker = createWorker<ExtractCertificateJob, CertificateOutcome['status']>(
  QUEUE_NAMES.EXTRACT_CERTIFICATE,
  processExtractCertificate
);

const metricsServer = serveMetrics(config.metricsPort, () =>
  reportQueueMetrics([
    { name: QUEUE_NAMES.EXTRACT_CERTIFICATE, queue: extractCertificateQueue },
    { name: QUEUE_NAMES.SUBMIT_BROKER, queue: submitBrokerQueue },
    { name: QUEUE_NAMES.REVIEW_REQUIRED, queue: reviewRequiredQueue },
  ])
);

logger.info('Certificate extractor worker started', {
  max_credits_per_course: pipelineConfig.max_credits_per_course,
  lookback_years: pipelineConfig.lookback_years,
  category_count: pipelineConfig.categories.length,
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  metricsServer.close();
  await worker.close();
  await extractCertificateQueue.close();
  await submitBrokerQueue.close();
  await reviewRequiredQueue.close();
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
