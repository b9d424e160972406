/**
 * Submission Reporting
 *
 * Batch views over built payloads: a totals summary, the CSV a licensee
 * uploads or copies from, and a sortable filename for the certificate file.
 */

import type { BrokerPayload, VerifiedCourseRecord } from '../types';
import { formatCredits, roundHalfUp } from './credits';

// ============================================================================
// Summary
// ============================================================================

export interface HoursBucket {
  count: number;
  hours: number;
}

export interface SubmissionSummary {
  total_submissions: number;
  total_hours: number;
  ethics_hours: number;
  general_hours: number;
  by_category: Record<string, HoursBucket>;
  by_subject: Record<string, HoursBucket>;
}

function addTo(buckets: Record<string, HoursBucket>, key: string, hours: number, precision: number): void {
  const bucket = buckets[key] ?? { count: 0, hours: 0 };
  buckets[key] = {
    count: bucket.count + 1,
    hours: roundHalfUp(bucket.hours + hours, precision),
  };
}

export function summarizePayloads(
  payloads: readonly BrokerPayload[],
  precision = 1
): SubmissionSummary {
  let total_hours = 0;
  let ethics_hours = 0;
  const by_category: Record<string, HoursBucket> = {};
  const by_subject: Record<string, HoursBucket> = {};

  for (const payload of payloads) {
    total_hours = roundHalfUp(total_hours + payload.hours, precision);
    if (payload.category === 'Professional Ethics CPE') {
      ethics_hours = roundHalfUp(ethics_hours + payload.hours, precision);
    }
    addTo(by_category, payload.category, payload.hours, precision);
    for (const subject of payload.subjects) {
      addTo(by_subject, subject, payload.hours, precision);
    }
  }

  return {
    total_submissions: payloads.length,
    total_hours,
    ethics_hours,
    general_hours: roundHalfUp(total_hours - ethics_hours, precision),
    by_category,
    by_subject,
  };
}

// ============================================================================
// CSV
// ============================================================================

export const CSV_HEADERS = [
  'Course Name',
  'Provider Name',
  'Completion Date',
  'Credits',
  'Delivery Method',
  'Subject Areas',
  'Course Code',
  'Field of Study',
  'NASBA Sponsor',
] as const;

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * RFC 4180 CSV, CRLF line endings, no trailing newline.
 */
export function toBrokerCsv(payloads: readonly BrokerPayload[], precision = 1): string {
  if (payloads.length === 0) {
    return 'No certificates found';
  }

  const rows = payloads.map((payload) => [
    payload.course_name,
    payload.provider_name,
    payload.completion_date,
    formatCredits(payload.hours, precision),
    payload.course_type,
    payload.subjects.join(', '),
    payload.course_code,
    payload.field_of_study,
    payload.sponsor_id ?? '',
  ]);

  const header: string[] = [...CSV_HEADERS];
  return [header, ...rows]
    .map((row) => row.map(csvCell).join(','))
    .join('\r\n');
}

// ============================================================================
// Filenames
// ============================================================================

const MAX_FILENAME_LENGTH = 200;

export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/_+/g, '_')
    .slice(0, MAX_FILENAME_LENGTH)
    .replace(/^_+|_+$/g, '');
}

function shortenCourseName(name: string): string {
  if (name.length <= 50) return name;
  let short = '';
  for (const word of name.split(/\s+/)) {
    if ((short + word).length >= 45) break;
    short += `${word}_`;
  }
  return short.replace(/_+$/, '');
}

/**
 * YYYYMMDD_<credits>CPE_<Course_Name>.<ext>, e.g.
 * "20250606_2CPE_Debt_Selected_Debt_Related_Issues.pdf".
 * Credits are shown as whole hours, rounded half up. The extension comes from
 * the uploaded file, defaulting to .pdf.
 */
export function suggestCertificateFilename(
  record: VerifiedCourseRecord,
  originalFilename?: string
): string {
  const date = record.completion_date.replace(/-/g, '');
  const credits = `${formatCredits(record.credits, 0)}CPE`;
  const base = sanitizeFilename(`${date}_${credits}_${shortenCourseName(record.course_name)}`);

  const dot = originalFilename?.lastIndexOf('.') ?? -1;
  const extension =
    originalFilename && dot > 0 && dot < originalFilename.length - 1
      ? originalFilename.slice(dot).toLowerCase()
      : '.pdf';

  return `${base}${extension}`;
}
