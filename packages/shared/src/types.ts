/**
 * Shared TypeScript Types
 *
 * Types for the certificate intake pipeline. BrokerPayload matches
 * docs/contracts/broker_payload.schema.json.
 */

// ============================================================================
// Documents & Segments
// ============================================================================

export type MediaType =
  | 'application/pdf'
  | 'image/png'
  | 'image/jpeg'
  | 'image/tiff'
  | 'image/bmp';

/**
 * Uploaded certificate. The pipeline only reads the metadata; the bytes stay
 * with the caller for the duration of one call.
 */
export interface RawDocument {
  document_id: string;
  source_filename: string;
  media_type: MediaType;
  content?: Uint8Array;
}

/** RawDocument without its bytes, safe to put on a queue. */
export type DocumentInfo = Omit<RawDocument, 'content'>;

/**
 * One block of text produced by the OCR/layout collaborator.
 * `field` is set when the layout step already knows which form field the
 * text fills; otherwise the segment is free text scanned with label patterns.
 */
export interface TextSegment {
  text: string;
  field?: FieldName;
  page_number?: number;
}

// ============================================================================
// Fields & Candidates
// ============================================================================

export type RequiredFieldName =
  | 'course_name'
  | 'course_code'
  | 'field_of_study'
  | 'credits'
  | 'completion_date';

export type OptionalFieldName = 'provider_name' | 'sponsor_id' | 'delivery_method';

export type FieldName = RequiredFieldName | OptionalFieldName;

/** Calendar date as YYYY-MM-DD */
export type IsoDate = string;

export interface CategoryMatch {
  /** Whitespace-normalized text as printed on the certificate */
  raw: string;
  /** Canonical category token, or null when nothing matched unambiguously */
  category: string | null;
  match_score: number;
}

export interface FieldValueMap {
  course_name: string;
  course_code: string;
  field_of_study: CategoryMatch;
  credits: number;
  completion_date: IsoDate;
  provider_name: string;
  sponsor_id: string;
  /** Delivery-method token */
  delivery_method: string;
}

/** Per-field additions to a candidate. */
interface CandidateExtras {
  completion_date: {
    /** Specificity rank of the date format that matched; breaks confidence ties */
    format_rank: number;
  };
}

/**
 * A typed value proposed for one field. Discriminated on field_name.
 * `confidence` is the confidence of the source (layout hint or label pattern).
 */
export type FieldCandidate<F extends FieldName = FieldName> = {
  [K in F]: {
    field_name: K;
    raw_text: string;
    parsed_value: FieldValueMap[K];
    confidence: number;
    segment_index: number;
  } & (K extends keyof CandidateExtras ? CandidateExtras[K] : unknown);
}[F];

export type CandidateSet = {
  [K in FieldName]: FieldCandidate<K>[];
};

/** Text found for a field that could not be parsed to the field's type. */
export interface MalformedValue {
  field_name: FieldName;
  raw_text: string;
  segment_index: number;
  reason: string;
}

export interface ParsedFields {
  candidates: CandidateSet;
  malformed: MalformedValue[];
}

// ============================================================================
// Records
// ============================================================================

export type RecordStatus = 'draft' | 'verified';

export interface CourseRecord<S extends RecordStatus = RecordStatus> {
  status: S;
  course_name: string;
  course_code: string;
  /** Reporting-category token */
  field_of_study: string;
  credits: number;
  completion_date: IsoDate;
  provider_name: string | null;
  sponsor_id: string | null;
  delivery_method: string | null;
}

export type DraftCourseRecord = CourseRecord<'draft'>;

export type VerifiedCourseRecord = Readonly<CourseRecord<'verified'>>;

// ============================================================================
// Validation
// ============================================================================

export type IssueKind =
  | 'MISSING'
  | 'AMBIGUOUS'
  | 'OUT_OF_RANGE'
  | 'UNRECOGNIZED_CATEGORY'
  | 'MALFORMED';

export interface ValidationIssue {
  field_name: FieldName;
  kind: IssueKind;
  message: string;
}

export type NonEmptyArray<T> = [T, ...T[]];

export type ValidationOutcome =
  | { ok: true; record: DraftCourseRecord }
  | { ok: false; issues: NonEmptyArray<ValidationIssue> };

export type ExtractionResult =
  | { ok: true; record: VerifiedCourseRecord }
  | { ok: false; issues: NonEmptyArray<ValidationIssue> };

// ============================================================================
// Configuration Tables
// ============================================================================

export interface ReportingCategory {
  /** Canonical token, e.g. "Taxes" */
  token: string;
  aliases: readonly string[];
  /** CE Broker subject checkboxes this category maps to */
  broker_subjects: readonly string[];
  ethics: boolean;
}

export interface DeliveryMethod {
  token: string;
  aliases: readonly string[];
  /** CE Broker course type */
  course_type: string;
}

export interface DateFormat {
  name: string;
  /** Anchored pattern with named groups year, month, day */
  pattern: RegExp;
  /** Specificity rank, recorded on the candidate as format_rank */
  confidence: number;
}

export interface PipelineConfig {
  categories: readonly ReportingCategory[];
  delivery_methods: readonly DeliveryMethod[];
  date_formats: readonly DateFormat[];
  min_credits_exclusive: number;
  max_credits_per_course: number;
  credit_precision: number;
  lookback_years: number;
  category_match_threshold: number;
}

// ============================================================================
// CE Broker
// ============================================================================

export type BrokerCategory = 'General CPE' | 'Professional Ethics CPE';

/**
 * Submitter and deployment constants that cannot be read off a certificate.
 * Keys are optional so that an incomplete deployment can be reported.
 */
export interface BrokerContext {
  organization_id?: string;
  form_version?: string;
  licensee_id?: string;
  default_provider_name?: string;
  default_delivery_method?: string;
}

export interface BrokerPayload {
  form_version: string;
  organization_id: string;
  licensee_id: string;
  category: BrokerCategory;
  course_type: string;
  /** MM/DD/YYYY, as entered on the broker form */
  completion_date: string;
  hours: number;
  course_name: string;
  course_code: string;
  provider_name: string;
  sponsor_id: string | null;
  field_of_study: string;
  subjects: string[];
}
