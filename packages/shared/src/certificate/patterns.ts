/**
 * Certificate Label Patterns
 *
 * Free-text segments are scanned line by line. Each pattern captures the value
 * printed after a label (or, for bare course codes and credit phrases, the
 * value itself). Patterns carry their own confidence: an explicit label is
 * worth more than a value recognized by shape alone.
 *
 * Example certificate text:
 * "Professional Education Services"
 * "Certificate of Completion"
 * "Course: Debt: Selected Debt Related Issues"
 * "Course Code: M116-2025-01-SSDL"
 * "Field of Study: Taxes"
 * "CPE Credits: 2.0"
 * "Date of Completion: Friday, June 6, 2025"
 * "NASBA Sponsor #112530"
 * "Instructional Method: QAS Self-Study"
 */

import type { FieldName } from '../types';

export interface LabelPattern {
  pattern: RegExp;
  confidence: number;
}

/** Confidence of a segment whose field was assigned by the layout step. */
export const HINTED_CONFIDENCE = 1.0;

export const FIELD_PATTERNS: Readonly<Record<FieldName, readonly LabelPattern[]>> = {
  course_name: [
    {
      pattern: /^\s*(?:course(?:\s+(?:name|title))?|program(?:\s+title)?|title)\s*[:-]\s*(.+)$/i,
      confidence: 0.9,
    },
    {
      pattern: /\bfor\s+(?:successfully\s+)?completing\s*[:-]?\s*(?:the\s+course\s+)?["“]?([^"”]+?)["”]?\s*$/i,
      confidence: 0.7,
    },
  ],
  course_code: [
    {
      pattern: /\bcourse\s*(?:code|id|number|no\.?|#)\s*[:#-]?\s*([A-Z0-9][A-Z0-9._/-]*)/i,
      confidence: 0.9,
    },
    {
      pattern: /\b([A-Z]\d{3}-\d{4}-\d{2}-[A-Z]+)\b/,
      confidence: 0.6,
    },
  ],
  field_of_study: [
    {
      pattern: /\b(?:field\s+of\s+study|subject\s+area|subject)\s*[:-]\s*(.+)$/i,
      confidence: 0.9,
    },
  ],
  credits: [
    {
      pattern: /\b(?:(?:recommended\s+)?cpe\s+)?(?:credits?|credit\s+hours|hours)(?:\s+(?:earned|awarded))?\s*[:-]\s*(.+)$/i,
      confidence: 0.9,
    },
    {
      pattern: /(-?\d+(?:[.,]\d+)?)\s*(?:cpe\s+)?(?:credits?|credit\s+hours|hours?)\b/i,
      confidence: 0.6,
    },
  ],
  completion_date: [
    {
      pattern: /\b(?:date\s+of\s+completion|completion\s+date|date\s+completed|completed\s+on)\s*[:-]?\s*(.+)$/i,
      confidence: 0.9,
    },
    {
      pattern: /^\s*date\s*[:-]\s*(.+)$/i,
      confidence: 0.8,
    },
    {
      pattern: /\b((?:mon|tues|wednes|thurs|fri|satur|sun)day,\s+[a-z]+\.?\s+\d{1,2},\s+\d{4})\b/i,
      confidence: 0.7,
    },
  ],
  provider_name: [
    {
      pattern: /\b(?:provider|sponsored\s+by|presented\s+by|offered\s+by)\s*[:-]\s*(.+)$/i,
      confidence: 0.9,
    },
  ],
  sponsor_id: [
    {
      pattern: /\bnasba\s+(?:sponsor\s*)?(?:id|number|no\.?|#)?\s*[:#]?\s*(\d{3,})/i,
      confidence: 0.9,
    },
    {
      pattern: /^\s*sponsor\s*(?:id|number|no\.?|#)\s*[:#]?\s*(\d{3,})/i,
      confidence: 0.8,
    },
  ],
  delivery_method: [
    {
      pattern: /\b(?:instructional\s+method|delivery\s+method|delivery\s+format|delivery)\s*[:-]\s*(.+)$/i,
      confidence: 0.9,
    },
  ],
};

export interface PatternMatch {
  field_name: FieldName;
  value: string;
  confidence: number;
}

/**
 * Run every pattern of every field over one line.
 */
export function matchLine(line: string): PatternMatch[] {
  const matches: PatternMatch[] = [];
  for (const [field_name, patterns] of fieldPatternEntries()) {
    for (const { pattern, confidence } of patterns) {
      const match = line.match(pattern);
      if (match?.[1] !== undefined) {
        matches.push({ field_name, value: match[1].trim(), confidence });
      }
    }
  }
  return matches;
}

const FIELD_ORDER: readonly FieldName[] = [
  'course_name',
  'course_code',
  'field_of_study',
  'credits',
  'completion_date',
  'provider_name',
  'sponsor_id',
  'delivery_method',
];

function fieldPatternEntries(): Array<[FieldName, readonly LabelPattern[]]> {
  return FIELD_ORDER.map((field) => [field, FIELD_PATTERNS[field]]);
}
