/**
 * Certificate Validator
 *
 * Resolves at most one candidate per field and checks domain constraints.
 * Every problem is collected; nothing stops at the first failure. Fields are
 * checked in FIELD_CHECK_ORDER so issue lists are deterministic.
 *
 * Candidate selection:
 * - the highest source confidence wins
 * - among dates of equal confidence, the most specific format wins
 * - equal top confidence with differing normalized values is AMBIGUOUS
 * - equal top confidence with the same normalized value is not ambiguous
 * - no candidate but malformed text is MALFORMED; nothing at all is MISSING
 */

import type {
  FieldCandidate,
  FieldName,
  IsoDate,
  MalformedValue,
  NonEmptyArray,
  ParsedFields,
  PipelineConfig,
  RequiredFieldName,
  ValidationIssue,
  ValidationOutcome,
} from '../types';
import { collapseWhitespace, normalizeLabel } from './categories';
import { roundHalfUp } from './credits';
import { canonicalIsoDate, subtractYears } from './dates';

export const FIELD_CHECK_ORDER: readonly FieldName[] = [
  'course_name',
  'course_code',
  'field_of_study',
  'credits',
  'completion_date',
  'provider_name',
  'sponsor_id',
  'delivery_method',
];

export const REQUIRED_FIELDS: readonly RequiredFieldName[] = [
  'course_name',
  'course_code',
  'field_of_study',
  'credits',
  'completion_date',
];

export type Selection<C extends FieldCandidate> =
  | { kind: 'selected'; candidate: C }
  | { kind: 'ambiguous'; candidates: C[] }
  | { kind: 'malformed'; values: MalformedValue[] }
  | { kind: 'missing' };

/**
 * Comparison key used to decide whether two candidates say the same thing.
 */
function candidateKey(candidate: FieldCandidate): string {
  switch (candidate.field_name) {
    case 'field_of_study':
      return candidate.parsed_value.category ?? `raw:${normalizeLabel(candidate.parsed_value.raw)}`;
    case 'credits':
      return String(candidate.parsed_value);
    default:
      return collapseWhitespace(candidate.parsed_value);
  }
}

function formatRank(candidate: FieldCandidate): number {
  return candidate.field_name === 'completion_date' ? candidate.format_rank : 0;
}

/**
 * Pick one candidate for a field, or say why none can be picked.
 */
export function selectCandidate<C extends FieldCandidate>(
  candidates: readonly C[],
  malformed: readonly MalformedValue[]
): Selection<C> {
  if (candidates.length === 0) {
    return malformed.length > 0 ? { kind: 'malformed', values: [...malformed] } : { kind: 'missing' };
  }

  const topConfidence = Math.max(...candidates.map((c) => c.confidence));
  const confident = candidates.filter((c) => c.confidence === topConfidence);
  const topRank = Math.max(...confident.map(formatRank));
  const top = confident.filter((c) => formatRank(c) === topRank);
  const [first] = top;

  const distinct = new Map<string, C>();
  for (const candidate of top) {
    const key = candidateKey(candidate);
    if (!distinct.has(key)) distinct.set(key, candidate);
  }

  if (distinct.size > 1) {
    return { kind: 'ambiguous', candidates: [...distinct.values()] };
  }
  return { kind: 'selected', candidate: first };
}

function describeValue(candidate: FieldCandidate): string {
  switch (candidate.field_name) {
    case 'field_of_study':
      return `"${candidate.parsed_value.raw}"`;
    case 'credits':
      return String(candidate.parsed_value);
    default:
      return `"${candidate.parsed_value}"`;
  }
}

/**
 * Turn a non-selected outcome into its issue. Optional fields are allowed to
 * be missing.
 */
function selectionIssue(
  field: FieldName,
  selection: Selection<FieldCandidate>,
  required: boolean
): ValidationIssue | null {
  switch (selection.kind) {
    case 'selected':
      return null;
    case 'missing':
      return required
        ? { field_name: field, kind: 'MISSING', message: `No value found for ${field}` }
        : null;
    case 'malformed':
      return {
        field_name: field,
        kind: 'MALFORMED',
        message: selection.values.map((value) => value.reason).join('; '),
      };
    case 'ambiguous':
      return {
        field_name: field,
        kind: 'AMBIGUOUS',
        message: `Conflicting values with equal confidence: ${selection.candidates
          .map(describeValue)
          .join(', ')}`,
      };
  }
}

function checkCompletionDate(
  date: IsoDate,
  processingDate: IsoDate,
  lookbackYears: number
): ValidationIssue | null {
  const value = canonicalIsoDate(date);
  const today = canonicalIsoDate(processingDate);
  const earliest = subtractYears(today, lookbackYears);

  if (value > today) {
    return {
      field_name: 'completion_date',
      kind: 'OUT_OF_RANGE',
      message: `Completion date ${value} is after the processing date ${today}`,
    };
  }
  if (value < earliest) {
    return {
      field_name: 'completion_date',
      kind: 'OUT_OF_RANGE',
      message: `Completion date ${value} is before the ${lookbackYears}-year reporting window (${earliest})`,
    };
  }
  return null;
}

/**
 * Bounds apply to the value the record will carry, after rounding to
 * credit_precision.
 */
function checkCredits(credits: number, config: PipelineConfig): ValidationIssue | null {
  const rounded = roundHalfUp(credits, config.credit_precision);
  if (rounded <= config.min_credits_exclusive || rounded > config.max_credits_per_course) {
    const shown = rounded === credits ? `${credits}` : `${credits} (rounded to ${rounded})`;
    return {
      field_name: 'credits',
      kind: 'OUT_OF_RANGE',
      message: `Credits ${shown} must be greater than ${config.min_credits_exclusive} and at most ${config.max_credits_per_course}`,
    };
  }
  return null;
}

export function toNonEmpty<T>(items: T[]): NonEmptyArray<T> | null {
  if (items.length === 0) return null;
  const [first, ...rest] = items;
  return [first, ...rest];
}

/**
 * Validate parsed fields against the config, as of `processingDate`.
 */
export function validateCandidates(
  parsed: ParsedFields,
  config: PipelineConfig,
  processingDate: IsoDate
): ValidationOutcome {
  const issues: ValidationIssue[] = [];

  const resolve = <C extends FieldCandidate>(
    field: FieldName,
    candidates: readonly C[]
  ): C['parsed_value'] | null => {
    const malformed = parsed.malformed.filter((value) => value.field_name === field);
    const selection = selectCandidate(candidates, malformed);
    const required = REQUIRED_FIELDS.some((name) => name === field);
    const issue = selectionIssue(field, selection, required);
    if (issue) issues.push(issue);
    return selection.kind === 'selected' ? selection.candidate.parsed_value : null;
  };

  const requireText = (field: 'course_name' | 'course_code', value: string | null) => {
    if (value === null) return null;
    const text = collapseWhitespace(value);
    if (text === '') {
      issues.push({ field_name: field, kind: 'MISSING', message: `${field} is empty` });
      return null;
    }
    return text;
  };

  // Checked in FIELD_CHECK_ORDER
  const course_name = requireText('course_name', resolve('course_name', parsed.candidates.course_name));
  const course_code = requireText('course_code', resolve('course_code', parsed.candidates.course_code));

  let field_of_study: string | null = null;
  const study = resolve('field_of_study', parsed.candidates.field_of_study);
  if (study) {
    if (study.category === null) {
      issues.push({
        field_name: 'field_of_study',
        kind: 'UNRECOGNIZED_CATEGORY',
        message: `"${study.raw}" does not match a reporting category`,
      });
    } else {
      field_of_study = study.category;
    }
  }

  let credits = resolve('credits', parsed.candidates.credits);
  if (credits !== null) {
    const issue = checkCredits(credits, config);
    if (issue) {
      issues.push(issue);
      credits = null;
    }
  }

  let completion_date = resolve('completion_date', parsed.candidates.completion_date);
  if (completion_date !== null) {
    const issue = checkCompletionDate(completion_date, processingDate, config.lookback_years);
    if (issue) {
      issues.push(issue);
      completion_date = null;
    }
  }

  const provider_name = resolve('provider_name', parsed.candidates.provider_name);
  const sponsor_id = resolve('sponsor_id', parsed.candidates.sponsor_id);
  const delivery_method = resolve('delivery_method', parsed.candidates.delivery_method);

  const blocking = toNonEmpty(issues);
  if (blocking) {
    return { ok: false, issues: blocking };
  }

  if (
    course_name === null ||
    course_code === null ||
    field_of_study === null ||
    credits === null ||
    completion_date === null
  ) {
    throw new Error('Validation left a required field unresolved without reporting an issue');
  }

  return {
    ok: true,
    record: {
      status: 'draft',
      course_name,
      course_code,
      field_of_study,
      credits,
      completion_date,
      provider_name,
      sponsor_id,
      delivery_method,
    },
  };
}
