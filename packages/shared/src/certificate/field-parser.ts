/**
 * Certificate Field Parser
 *
 * Turns OCR text segments into typed FieldCandidates. Pure: the same segments
 * and config always give the same candidates, in segment order.
 *
 * - Segments with a `field` hint are parsed as that field's value.
 * - Other segments are split into lines and scanned with FIELD_PATTERNS.
 * - Text that belongs to a field but does not parse becomes a MalformedValue,
 *   never a low-confidence guess.
 */

import type {
  CandidateSet,
  FieldCandidate,
  FieldName,
  MalformedValue,
  ParsedFields,
  PipelineConfig,
  TextSegment,
} from '../types';
import { HINTED_CONFIDENCE, matchLine } from './patterns';
import { parseCertificateDate } from './dates';
import { parseCredits } from './credits';
import { collapseWhitespace, findDeliveryMethod, matchCategory } from './categories';

type ValueParse =
  | { ok: true; candidate: FieldCandidate }
  | { ok: false; reason: string }
  | { ok: 'empty' };

/**
 * Parse one field value. `confidence` is the source confidence; dates also
 * record the specificity rank of the format that matched.
 */
function parseValue(
  field: FieldName,
  text: string,
  confidence: number,
  segment_index: number,
  config: PipelineConfig
): ValueParse {
  const raw_text = collapseWhitespace(text);
  if (raw_text === '') {
    return { ok: 'empty' };
  }
  const base = { raw_text, confidence, segment_index };

  switch (field) {
    case 'credits': {
      const credits = parseCredits(raw_text);
      return credits.ok
        ? { ok: true, candidate: { ...base, field_name: field, parsed_value: credits.value } }
        : { ok: false, reason: credits.reason };
    }

    case 'completion_date': {
      const date = parseCertificateDate(raw_text, config.date_formats);
      return date
        ? {
            ok: true,
            candidate: { ...base, field_name: field, parsed_value: date.iso, format_rank: date.confidence },
          }
        : { ok: false, reason: `"${raw_text}" matches no accepted date format` };
    }

    case 'field_of_study': {
      const match = matchCategory(raw_text, config.categories, config.category_match_threshold);
      return { ok: true, candidate: { ...base, field_name: field, parsed_value: match } };
    }

    case 'delivery_method': {
      const method = findDeliveryMethod(raw_text, config.delivery_methods);
      return method
        ? { ok: true, candidate: { ...base, field_name: field, parsed_value: method.token } }
        : { ok: false, reason: `"${raw_text}" is not a known delivery method` };
    }

    default:
      return { ok: true, candidate: { ...base, field_name: field, parsed_value: raw_text } };
  }
}

export function emptyCandidateSet(): CandidateSet {
  return {
    course_name: [],
    course_code: [],
    field_of_study: [],
    credits: [],
    completion_date: [],
    provider_name: [],
    sponsor_id: [],
    delivery_method: [],
  };
}

/**
 * Append a candidate to the list of its own field.
 */
export function addCandidate(set: CandidateSet, candidate: FieldCandidate): void {
  switch (candidate.field_name) {
    case 'course_name':
      set.course_name.push(candidate);
      break;
    case 'course_code':
      set.course_code.push(candidate);
      break;
    case 'field_of_study':
      set.field_of_study.push(candidate);
      break;
    case 'credits':
      set.credits.push(candidate);
      break;
    case 'completion_date':
      set.completion_date.push(candidate);
      break;
    case 'provider_name':
      set.provider_name.push(candidate);
      break;
    case 'sponsor_id':
      set.sponsor_id.push(candidate);
      break;
    case 'delivery_method':
      set.delivery_method.push(candidate);
      break;
  }
}

/**
 * Parse all segments into candidates per field plus malformed values.
 */
export function parseFields(
  segments: readonly TextSegment[],
  config: PipelineConfig
): ParsedFields {
  const candidates = emptyCandidateSet();
  const malformed: MalformedValue[] = [];

  const accept = (
    field: FieldName,
    text: string,
    confidence: number,
    segment_index: number
  ): void => {
    const parsed = parseValue(field, text, confidence, segment_index, config);
    if (parsed.ok === true) {
      addCandidate(candidates, parsed.candidate);
    } else if (parsed.ok === false) {
      malformed.push({
        field_name: field,
        raw_text: collapseWhitespace(text),
        segment_index,
        reason: parsed.reason,
      });
    }
  };

  segments.forEach((segment, segment_index) => {
    if (segment.field) {
      accept(segment.field, segment.text, HINTED_CONFIDENCE, segment_index);
      return;
    }

    for (const line of segment.text.split(/\r?\n/)) {
      for (const match of matchLine(line)) {
        accept(match.field_name, match.value, match.confidence, segment_index);
      }
    }
  });

  return { candidates, malformed };
}
