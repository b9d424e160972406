/**
 * Certificate Extraction Pipeline
 *
 * parseFields → validateCandidates → normalizeRecord, as one synchronous call.
 * Always returns either a verified record or a non-empty issue list.
 */

import type {
  ExtractionResult,
  FieldName,
  IsoDate,
  ParsedFields,
  PipelineConfig,
  RawDocument,
  TextSegment,
} from '../types';
import { logger } from '../logger';
import { parseFields } from './field-parser';
import { FIELD_CHECK_ORDER, validateCandidates } from './validator';
import { normalizeRecord } from './normalizer';
import { toLocalIsoDate } from './dates';

export interface ExtractionOptions {
  config: PipelineConfig;
  /** Date the window checks are relative to; defaults to today (local). */
  processing_date?: IsoDate;
}

function candidateCounts(parsed: ParsedFields): Partial<Record<FieldName, number>> {
  const counts: Partial<Record<FieldName, number>> = {};
  for (const field of FIELD_CHECK_ORDER) {
    const count = parsed.candidates[field].length;
    if (count > 0) counts[field] = count;
  }
  return counts;
}

export function extract(
  document: RawDocument,
  segments: readonly TextSegment[],
  options: ExtractionOptions
): ExtractionResult {
  const processingDate = options.processing_date ?? toLocalIsoDate(new Date());

  const parsed = parseFields(segments, options.config);

  logger.debug('Certificate fields parsed', {
    document_id: document.document_id,
    segment_count: segments.length,
    candidate_counts: candidateCounts(parsed),
    malformed_count: parsed.malformed.length,
  });

  const outcome = validateCandidates(parsed, options.config, processingDate);

  if (!outcome.ok) {
    logger.info('Certificate rejected', {
      document_id: document.document_id,
      issue_count: outcome.issues.length,
      issues: outcome.issues.map((issue) => `${issue.field_name}:${issue.kind}`),
    });
    return outcome;
  }

  const record = normalizeRecord(outcome.record, options.config);

  logger.info('Certificate verified', {
    document_id: document.document_id,
    course_code: record.course_code,
    credits: record.credits,
  });

  return { ok: true, record };
}
