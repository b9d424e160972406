/**
 * Pipeline Configuration
 *
 * Category and delivery-method tables, date formats and numeric bounds are
 * handed to every pipeline stage as one frozen PipelineConfig value; nothing
 * in the pipeline reads process-wide state.
 */

import reportingCategories from '../../data/reporting-categories.json';
import deliveryMethods from '../../data/delivery-methods.json';
import type { DeliveryMethod, PipelineConfig, ReportingCategory } from '../types';
import { DEFAULT_DATE_FORMATS } from './dates';

export const DEFAULT_CATEGORIES: readonly ReportingCategory[] = deepFreeze(reportingCategories);

export const DEFAULT_DELIVERY_METHODS: readonly DeliveryMethod[] = deepFreeze(deliveryMethods);

export const DEFAULT_PIPELINE_SETTINGS = {
  min_credits_exclusive: 0,
  max_credits_per_course: 40,
  credit_precision: 1,
  lookback_years: 3,
  category_match_threshold: 0.75,
} as const;

function deepFreeze<T extends object>(items: T[]): readonly T[] {
  for (const item of items) {
    for (const value of Object.values(item)) {
      if (Array.isArray(value)) Object.freeze(value);
    }
    Object.freeze(item);
  }
  return Object.freeze(items);
}

/**
 * Build a config from explicit values, falling back to the bundled defaults.
 */
export function createPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const config: PipelineConfig = {
    categories: DEFAULT_CATEGORIES,
    delivery_methods: DEFAULT_DELIVERY_METHODS,
    date_formats: DEFAULT_DATE_FORMATS,
    ...DEFAULT_PIPELINE_SETTINGS,
    ...overrides,
  };

  if (!Number.isInteger(config.credit_precision) || config.credit_precision < 0) {
    throw new Error(`credit_precision must be a non-negative integer, got ${config.credit_precision}`);
  }
  if (!Number.isInteger(config.lookback_years) || config.lookback_years < 0) {
    throw new Error(`lookback_years must be a non-negative integer, got ${config.lookback_years}`);
  }
  if (config.max_credits_per_course <= config.min_credits_exclusive) {
    throw new Error('max_credits_per_course must exceed min_credits_exclusive');
  }
  if (config.categories.length === 0) {
    throw new Error('At least one reporting category is required');
  }

  return Object.freeze(config);
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Default config with numeric overrides from the environment:
 * CE_MAX_CREDITS_PER_COURSE, CE_LOOKBACK_YEARS, CE_CREDIT_PRECISION,
 * CE_CATEGORY_MATCH_THRESHOLD.
 */
export function loadPipelineConfig(
  overrides: Partial<PipelineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const fromEnv: Partial<PipelineConfig> = {};

  const maxCredits = readNumber(env, 'CE_MAX_CREDITS_PER_COURSE');
  if (maxCredits !== undefined) fromEnv.max_credits_per_course = maxCredits;

  const lookback = readNumber(env, 'CE_LOOKBACK_YEARS');
  if (lookback !== undefined) fromEnv.lookback_years = lookback;

  const precision = readNumber(env, 'CE_CREDIT_PRECISION');
  if (precision !== undefined) fromEnv.credit_precision = precision;

  const threshold = readNumber(env, 'CE_CATEGORY_MATCH_THRESHOLD');
  if (threshold !== undefined) fromEnv.category_match_threshold = threshold;

  return createPipelineConfig({ ...fromEnv, ...overrides });
}
