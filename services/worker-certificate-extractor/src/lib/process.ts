/**
 * extract_certificate processing
 *
 * Runs the pipeline for one queued certificate and routes the result:
 * verified → submit_broker, rejected → review_required.
 * Queues are injected so the routing runs without Redis.
 */

import {
  logger,
  runWithContextAsync,
  contextForDocument,
  extract,
  buildBrokerPayload,
  suggestCertificateFilename,
  toLocalIsoDate,
  ConfigIncompleteError,
  certificatesProcessedCounter,
  validationIssuesCounter,
  extractionDurationHistogram,
  type BrokerContext,
  type BrokerPayload,
  type ExtractCertificateJob,
  type PipelineConfig,
  type ReviewRequiredJob,
  type SubmitBrokerJob,
  type ValidationIssue,
} from '@ce-intake/shared';

/** The slice of a BullMQ Queue the processor publishes through. */
export interface JobPublisher<T> {
  add(name: string, data: T, opts?: { jobId?: string }): Promise<unknown>;
}

export interface ProcessDeps {
  submitBroker: JobPublisher<SubmitBrokerJob>;
  reviewRequired: JobPublisher<ReviewRequiredJob>;
  pipelineConfig: PipelineConfig;
  brokerContext: BrokerContext;
  now?: () => Date;
}

export type CertificateOutcome =
  | { status: 'verified'; payload: BrokerPayload; suggested_filename: string }
  | { status: 'rejected'; issues: ValidationIssue[] };

function jobIdFor(prefix: string, documentId: string): string {
  return `${prefix}_${documentId.replace(/:/g, '_')}`;
}

export async function processCertificateJob(
  data: ExtractCertificateJob,
  deps: ProcessDeps
): Promise<CertificateOutcome> {
  const { correlation_id, document, segments } = data;

  return runWithContextAsync(
    contextForDocument(correlation_id, document),
    async () => {
      const stopTimer = extractionDurationHistogram.startTimer();
      const result = extract(document, segments, {
        config: deps.pipelineConfig,
        processing_date: toLocalIsoDate((deps.now ?? (() => new Date()))()),
      });
      stopTimer();

      if (!result.ok) {
        for (const issue of result.issues) {
          validationIssuesCounter.inc({ kind: issue.kind, field: issue.field_name });
        }
        certificatesProcessedCounter.inc({ outcome: 'rejected' });

        const review: ReviewRequiredJob = {
          event_type: 'certificate.rejected',
          correlation_id,
          document_id: document.document_id,
          issues: result.issues,
        };
        await deps.reviewRequired.add('review_required', review, {
          jobId: jobIdFor('review', document.document_id),
        });

        logger.info('Enqueued review_required', {
          document_id: document.document_id,
          issue_count: result.issues.length,
        });
        return { status: 'rejected', issues: result.issues };
      }

      let payload: BrokerPayload;
      try {
        payload = buildBrokerPayload(result.record, deps.brokerContext, deps.pipelineConfig);
      } catch (error) {
        if (error instanceof ConfigIncompleteError) {
          certificatesProcessedCounter.inc({ outcome: 'config_incomplete' });
          logger.error('Broker context incomplete, cannot build payload', error, {
            missing: error.missing,
          });
        }
        throw error;
      }

      const suggested_filename = suggestCertificateFilename(result.record, document.source_filename);
      const submission: SubmitBrokerJob = {
        event_type: 'certificate.verified',
        correlation_id,
        document_id: document.document_id,
        record: result.record,
        payload,
        suggested_filename,
      };
      await deps.submitBroker.add('submit_broker', submission, {
        jobId: jobIdFor('submit', document.document_id),
      });

      certificatesProcessedCounter.inc({ outcome: 'verified' });
      logger.info('Enqueued submit_broker', {
        document_id: document.document_id,
        category: payload.category,
        hours: payload.hours,
      });

      return { status: 'verified', payload, suggested_filename };
    }
  );
}
