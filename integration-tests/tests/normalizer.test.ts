/**
 * Normalizer: canonical verified records
 */

import { normalizeRecord, createPipelineConfig } from '@ce-intake/shared';
import type { DraftCourseRecord } from '@ce-intake/shared';

const config = createPipelineConfig();

const draft: DraftCourseRecord = {
  status: 'draft',
  course_name: '  Debt:   Selected Debt Related Issues ',
  course_code: 'M116-2025-01-SSDL',
  field_of_study: 'Taxation',
  credits: 2.25,
  completion_date: '2025-6-6',
  provider_name: '   ',
  sponsor_id: ' 112530 ',
  delivery_method: 'self study',
};

describe('normalizeRecord', () => {
  it('should produce the canonical verified form', () => {
    expect(normalizeRecord(draft, config)).toEqual({
      status: 'verified',
      course_name: 'Debt: Selected Debt Related Issues',
      course_code: 'M116-2025-01-SSDL',
      field_of_study: 'Taxes',
      credits: 2.3,
      completion_date: '2025-06-06',
      provider_name: null,
      sponsor_id: '112530',
      delivery_method: 'QAS Self-Study',
    });
  });

  it('should be idempotent', () => {
    const once = normalizeRecord(draft, config);
    expect(normalizeRecord(once, config)).toEqual(once);
  });

  it('should freeze the record', () => {
    expect(Object.isFrozen(normalizeRecord(draft, config))).toBe(true);
  });

  it('should round to the configured precision', () => {
    const whole = createPipelineConfig({ credit_precision: 0 });
    expect(normalizeRecord({ ...draft, credits: 2.5 }, whole).credits).toBe(3);
  });

  it('should keep a missing delivery method as null', () => {
    expect(normalizeRecord({ ...draft, delivery_method: null }, config).delivery_method).toBeNull();
  });

  it('should throw on a category outside the config', () => {
    expect(() => normalizeRecord({ ...draft, field_of_study: 'Astrology' }, config)).toThrow(
      'Unknown reporting category: Astrology'
    );
  });
});
