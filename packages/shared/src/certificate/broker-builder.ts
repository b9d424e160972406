/**
 * CE Broker Payload Builder
 *
 * Maps a verified course record onto the CE Broker submission form:
 * - category: "Professional Ethics CPE" for ethics fields of study or course
 *   names that read as ethics courses, "General CPE" otherwise
 * - course_type: from the record's delivery method, else the context default,
 *   else computer-based training
 * - subjects: the broker checkboxes of the record's reporting category
 * - completion_date: MM/DD/YYYY as the form takes it
 */

import type {
  BrokerCategory,
  BrokerContext,
  BrokerPayload,
  PipelineConfig,
  VerifiedCourseRecord,
} from '../types';
import { validateBrokerPayload } from '../schemas';
import { findCategory, findDeliveryMethod } from './categories';
import { roundHalfUp } from './credits';
import { toBrokerDate } from './dates';
import { ConfigIncompleteError } from './errors';

export const COMPUTER_BASED_COURSE_TYPE = 'Computer-Based Training (ie: online courses)';

export const ETHICS_KEYWORDS: readonly string[] = [
  'ethics',
  'professional conduct',
  'professional responsibility',
  'code of conduct',
];

const REQUIRED_CONTEXT_KEYS = ['organization_id', 'form_version', 'licensee_id'] as const;

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

export function isEthicsCourse(courseName: string): boolean {
  const name = courseName.toLowerCase();
  return ETHICS_KEYWORDS.some((keyword) => name.includes(keyword));
}

/**
 * Build the submission payload. Throws ConfigIncompleteError listing every
 * absent context constant.
 */
export function buildBrokerPayload(
  record: VerifiedCourseRecord,
  context: BrokerContext,
  config: PipelineConfig
): BrokerPayload {
  const missing: string[] = REQUIRED_CONTEXT_KEYS.filter((key) => !present(context[key]));

  const provider_name = record.provider_name ?? context.default_provider_name;
  if (!present(provider_name)) {
    missing.push('default_provider_name');
  }

  let course_type = COMPUTER_BASED_COURSE_TYPE;
  const deliveryLabel = record.delivery_method ?? context.default_delivery_method;
  if (present(deliveryLabel)) {
    const method = findDeliveryMethod(deliveryLabel, config.delivery_methods);
    if (method) {
      course_type = method.course_type;
    } else {
      missing.push('default_delivery_method');
    }
  }

  const { organization_id, form_version, licensee_id } = context;
  if (
    missing.length > 0 ||
    !present(organization_id) ||
    !present(form_version) ||
    !present(licensee_id) ||
    !present(provider_name)
  ) {
    throw new ConfigIncompleteError(missing);
  }

  const category = findCategory(record.field_of_study, config.categories);
  if (!category) {
    throw new Error(`Unknown reporting category: ${record.field_of_study}`);
  }

  const brokerCategory: BrokerCategory =
    category.ethics || isEthicsCourse(record.course_name) ? 'Professional Ethics CPE' : 'General CPE';

  const payload: BrokerPayload = {
    form_version,
    organization_id,
    licensee_id,
    category: brokerCategory,
    course_type,
    completion_date: toBrokerDate(record.completion_date),
    hours: roundHalfUp(record.credits, config.credit_precision),
    course_name: record.course_name,
    course_code: record.course_code,
    provider_name,
    sponsor_id: record.sponsor_id,
    field_of_study: category.token,
    subjects: [...category.broker_subjects],
  };

  const validation = validateBrokerPayload(payload);
  if (!validation.valid) {
    throw new Error(`Broker payload failed schema validation: ${validation.errors?.join('; ')}`);
  }

  return payload;
}
