/**
 * Job Context
 *
 * The certificate a worker is processing, held in AsyncLocalStorage so every
 * log line of one extraction carries its correlation and document IDs.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';
import type { DocumentInfo } from './types';

export interface JobContext {
  correlationId: string;
  documentId: string;
  sourceFilename: string;
}

const jobContextStore = new AsyncLocalStorage<JobContext>();

export function contextForDocument(correlationId: string, document: DocumentInfo): JobContext {
  return {
    correlationId,
    documentId: document.document_id,
    sourceFilename: document.source_filename,
  };
}

export function getContext(): JobContext | undefined {
  return jobContextStore.getStore();
}

/** Outside a job every call yields a fresh ULID. */
export function getCorrelationId(): string {
  return getContext()?.correlationId ?? ulid();
}

export function runWithContextAsync<T>(context: JobContext, fn: () => Promise<T>): Promise<T> {
  return jobContextStore.run(context, fn);
}
