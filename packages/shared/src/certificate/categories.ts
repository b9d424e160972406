/**
 * Reporting-Category and Delivery-Method Matching
 *
 * Certificates print the field of study loosely ("Tax", "Taxation",
 * "Communications & Marketing", OCR typos). Matching scores each category by
 * its token and aliases:
 * - exact match of the normalized label: 1.0
 * - a token or alias appearing as a whole phrase inside the text: 0.9
 * - otherwise the Sørensen-Dice coefficient over character bigrams
 *
 * The best category at or above the threshold wins. Two different categories
 * sharing the top score leave the match unresolved.
 */

import type { CategoryMatch, DeliveryMethod, ReportingCategory } from '../types';

const PHRASE_SCORE = 0.9;

/**
 * Lowercase, "&" → "and", punctuation to single spaces.
 */
export function normalizeLabel(text: string): string {
  return text
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function bigrams(text: string): Map<string, number> {
  const compact = text.replace(/\s+/g, '');
  const counts = new Map<string, number>();
  for (let i = 0; i < compact.length - 1; i++) {
    const gram = compact.slice(i, i + 2);
    counts.set(gram, (counts.get(gram) || 0) + 1);
  }
  return counts;
}

/**
 * Sørensen-Dice coefficient over character bigrams (multiset).
 */
export function diceCoefficient(a: string, b: string): number {
  const left = bigrams(a);
  const right = bigrams(b);
  let leftTotal = 0;
  let rightTotal = 0;
  let shared = 0;

  for (const count of left.values()) leftTotal += count;
  for (const [gram, count] of right) {
    rightTotal += count;
    shared += Math.min(count, left.get(gram) || 0);
  }

  if (leftTotal === 0 || rightTotal === 0) {
    return a.replace(/\s+/g, '') === b.replace(/\s+/g, '') ? 1 : 0;
  }
  return (2 * shared) / (leftTotal + rightTotal);
}

function labelScore(normalizedText: string, label: string): number {
  const normalizedLabel = normalizeLabel(label);
  if (normalizedLabel === '') return 0;
  if (normalizedText === normalizedLabel) return 1;
  if (` ${normalizedText} `.includes(` ${normalizedLabel} `)) return PHRASE_SCORE;
  return diceCoefficient(normalizedText, normalizedLabel);
}

function categoryScore(normalizedText: string, category: ReportingCategory): number {
  return Math.max(
    ...[category.token, ...category.aliases].map((label) => labelScore(normalizedText, label))
  );
}

/**
 * Match free text against the category enumeration.
 */
export function matchCategory(
  text: string,
  categories: readonly ReportingCategory[],
  threshold: number
): CategoryMatch {
  const raw = collapseWhitespace(text);
  const normalized = normalizeLabel(raw);
  if (normalized === '') {
    return { raw, category: null, match_score: 0 };
  }

  let bestScore = 0;
  let best: string[] = [];

  for (const category of categories) {
    const score = categoryScore(normalized, category);
    if (score > bestScore) {
      bestScore = score;
      best = [category.token];
    } else if (score === bestScore && score > 0) {
      best.push(category.token);
    }
  }

  const resolved = bestScore >= threshold && best.length === 1 ? best[0] : null;
  return { raw, category: resolved, match_score: bestScore };
}

/**
 * Find a category by exact token or alias (normalized). No fuzzy matching.
 */
export function findCategory(
  label: string,
  categories: readonly ReportingCategory[]
): ReportingCategory | undefined {
  const normalized = normalizeLabel(label);
  return categories.find((category) =>
    [category.token, ...category.aliases].some((name) => normalizeLabel(name) === normalized)
  );
}

/**
 * Find a delivery method by exact token or alias (normalized).
 */
export function findDeliveryMethod(
  label: string,
  methods: readonly DeliveryMethod[]
): DeliveryMethod | undefined {
  const normalized = normalizeLabel(label);
  if (normalized === '') return undefined;
  return methods.find((method) =>
    [method.token, ...method.aliases].some((name) => normalizeLabel(name) === normalized)
  );
}
