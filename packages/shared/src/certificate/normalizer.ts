/**
 * Course Record Normalizer
 *
 * Produces the verified, canonical form of a record that passed validation.
 * normalizeRecord(normalizeRecord(r)) equals normalizeRecord(r).
 */

import type { CourseRecord, PipelineConfig, VerifiedCourseRecord } from '../types';
import { collapseWhitespace, findCategory, findDeliveryMethod } from './categories';
import { roundHalfUp } from './credits';
import { canonicalIsoDate } from './dates';

function optionalText(value: string | null): string | null {
  if (value === null) return null;
  const text = collapseWhitespace(value);
  return text === '' ? null : text;
}

/**
 * Canonicalize and freeze. Throws when the record carries a category or
 * delivery method that is not in the config, which validation rules out.
 */
export function normalizeRecord(record: CourseRecord, config: PipelineConfig): VerifiedCourseRecord {
  const category = findCategory(record.field_of_study, config.categories);
  if (!category) {
    throw new Error(`Unknown reporting category: ${record.field_of_study}`);
  }

  let delivery_method: string | null = null;
  if (record.delivery_method !== null) {
    const method = findDeliveryMethod(record.delivery_method, config.delivery_methods);
    if (!method) {
      throw new Error(`Unknown delivery method: ${record.delivery_method}`);
    }
    delivery_method = method.token;
  }

  const verified: VerifiedCourseRecord = {
    status: 'verified',
    course_name: collapseWhitespace(record.course_name),
    course_code: collapseWhitespace(record.course_code),
    field_of_study: category.token,
    credits: roundHalfUp(record.credits, config.credit_precision),
    completion_date: canonicalIsoDate(record.completion_date),
    provider_name: optionalText(record.provider_name),
    sponsor_id: optionalText(record.sponsor_id),
    delivery_method,
  };

  return Object.freeze(verified);
}
