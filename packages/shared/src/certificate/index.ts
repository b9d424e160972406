/**
 * Certificate Pipeline - Exports
 */

export { parseFields, emptyCandidateSet, addCandidate } from './field-parser';
export {
  validateCandidates,
  selectCandidate,
  toNonEmpty,
  FIELD_CHECK_ORDER,
  REQUIRED_FIELDS,
  type Selection,
} from './validator';
export { normalizeRecord } from './normalizer';
export { extract, type ExtractionOptions } from './pipeline';
export {
  buildBrokerPayload,
  isEthicsCourse,
  COMPUTER_BASED_COURSE_TYPE,
  ETHICS_KEYWORDS,
} from './broker-builder';
export { ConfigIncompleteError } from './errors';
export {
  createPipelineConfig,
  loadPipelineConfig,
  DEFAULT_CATEGORIES,
  DEFAULT_DELIVERY_METHODS,
  DEFAULT_PIPELINE_SETTINGS,
} from './pipeline-config';
export {
  DEFAULT_DATE_FORMATS,
  parseCertificateDate,
  canonicalIsoDate,
  subtractYears,
  toLocalIsoDate,
  toBrokerDate,
  type ParsedDate,
} from './dates';
export { parseCredits, roundHalfUp, formatCredits, type CreditParse } from './credits';
export {
  matchCategory,
  findCategory,
  findDeliveryMethod,
  normalizeLabel,
  collapseWhitespace,
  diceCoefficient,
} from './categories';
export { FIELD_PATTERNS, HINTED_CONFIDENCE, matchLine, type LabelPattern } from './patterns';
export {
  summarizePayloads,
  toBrokerCsv,
  suggestCertificateFilename,
  sanitizeFilename,
  CSV_HEADERS,
  type SubmissionSummary,
  type HoursBucket,
} from './reporting';
