/**
 * CE Broker payload builder
 */

import {
  buildBrokerPayload,
  normalizeRecord,
  createPipelineConfig,
  validateBrokerPayload,
  isEthicsCourse,
  ConfigIncompleteError,
  COMPUTER_BASED_COURSE_TYPE,
} from '@ce-intake/shared';
import type { BrokerContext, DraftCourseRecord, VerifiedCourseRecord } from '@ce-intake/shared';

const config = createPipelineConfig();

const context: BrokerContext = {
  organization_id: 'org-test',
  form_version: '2024.1',
  licensee_id: 'lic-test',
  default_provider_name: 'Self Reported',
};

function verified(overrides: Partial<DraftCourseRecord> = {}): VerifiedCourseRecord {
  return normalizeRecord(
    {
      status: 'draft',
      course_name: 'Debt: Selected Debt Related Issues',
      course_code: 'M116-2025-01-SSDL',
      field_of_study: 'Taxes',
      credits: 2.0,
      completion_date: '2025-06-06',
      provider_name: null,
      sponsor_id: null,
      delivery_method: null,
      ...overrides,
    },
    config
  );
}

function incompleteError(fn: () => unknown): ConfigIncompleteError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigIncompleteError) return error;
    throw error;
  }
  throw new Error('Expected ConfigIncompleteError');
}

describe('buildBrokerPayload', () => {
  it('should map a verified record onto the broker form', () => {
    expect(buildBrokerPayload(verified(), context, config)).toEqual({
      form_version: '2024.1',
      organization_id: 'org-test',
      licensee_id: 'lic-test',
      category: 'General CPE',
      course_type: COMPUTER_BASED_COURSE_TYPE,
      completion_date: '06/06/2025',
      hours: 2.0,
      course_name: 'Debt: Selected Debt Related Issues',
      course_code: 'M116-2025-01-SSDL',
      provider_name: 'Self Reported',
      sponsor_id: null,
      field_of_study: 'Taxes',
      subjects: ['Taxes'],
    });
  });

  it('should prefer the provider and sponsor printed on the certificate', () => {
    const payload = buildBrokerPayload(
      verified({ provider_name: 'Acme Learning LLC', sponsor_id: '112530' }),
      context,
      config
    );
    expect(payload.provider_name).toBe('Acme Learning LLC');
    expect(payload.sponsor_id).toBe('112530');
  });

  it('should report ethics categories as ethics CPE', () => {
    const payload = buildBrokerPayload(verified({ field_of_study: 'Ethics (Regulatory)' }), context, config);
    expect(payload.category).toBe('Professional Ethics CPE');
    expect(payload.subjects).toEqual(['Administrative practices']);
  });

  it('should report ethics course names as ethics CPE', () => {
    const payload = buildBrokerPayload(
      verified({ course_name: 'Professional Conduct for CPAs', field_of_study: 'Accounting' }),
      context,
      config
    );
    expect(payload.category).toBe('Professional Ethics CPE');
    expect(payload.field_of_study).toBe('Accounting');
  });

  it('should map every broker subject of the category', () => {
    const payload = buildBrokerPayload(verified({ field_of_study: 'Marketing' }), context, config);
    expect(payload.field_of_study).toBe('Communications and Marketing');
    expect(payload.subjects).toEqual(['Communications', 'Marketing']);
  });

  it('should derive the course type from the delivery method', () => {
    const payload = buildBrokerPayload(verified({ delivery_method: 'Group Live' }), context, config);
    expect(payload.course_type).toBe('Live (Involves live interaction with presenter/host)');
  });

  it('should fall back to the default delivery method', () => {
    const payload = buildBrokerPayload(
      verified(),
      { ...context, default_delivery_method: 'Webinar' },
      config
    );
    expect(payload.course_type).toBe('Live (Involves live interaction with presenter/host)');
  });

  it('should list every absent context constant', () => {
    const error = incompleteError(() => buildBrokerPayload(verified(), {}, config));

    expect(error.code).toBe('CONFIG_INCOMPLETE');
    expect(error.missing).toEqual(['organization_id', 'form_version', 'licensee_id', 'default_provider_name']);
    expect(error.message).toBe(
      'Broker context is incomplete: missing or invalid organization_id, form_version, licensee_id, default_provider_name'
    );
  });

  it('should treat blank constants as absent', () => {
    const error = incompleteError(() =>
      buildBrokerPayload(verified(), { ...context, licensee_id: '   ' }, config)
    );
    expect(error.missing).toEqual(['licensee_id']);
  });

  it('should not need a default provider when the certificate names one', () => {
    const payload = buildBrokerPayload(
      verified({ provider_name: 'Acme Learning LLC' }),
      { ...context, default_provider_name: undefined },
      config
    );
    expect(payload.provider_name).toBe('Acme Learning LLC');
  });

  it('should reject an unknown default delivery method', () => {
    const error = incompleteError(() =>
      buildBrokerPayload(verified(), { ...context, default_delivery_method: 'Carrier pigeon' }, config)
    );
    expect(error.missing).toEqual(['default_delivery_method']);
  });

  it('should build payloads that pass the broker schema', () => {
    const payload = buildBrokerPayload(verified({ field_of_study: 'Fraud' }), context, config);
    expect(payload.subjects).toEqual(['Public auditing', 'Administrative practices']);
    expect(validateBrokerPayload(payload)).toEqual({ valid: true });
  });
});

describe('validateBrokerPayload', () => {
  const payload = buildBrokerPayload(verified(), context, config);

  it('should reject non-positive hours', () => {
    expect(validateBrokerPayload({ ...payload, hours: 0 })).toEqual({
      valid: false,
      errors: ['/hours: must be > 0'],
    });
  });

  it('should reject unknown properties', () => {
    expect(validateBrokerPayload({ ...payload, notes: 'n/a' })).toEqual({
      valid: false,
      errors: ['/: must NOT have additional properties'],
    });
  });
});

describe('isEthicsCourse', () => {
  it('should recognize ethics wording case-insensitively', () => {
    expect(isEthicsCourse('Annual ETHICS Update')).toBe(true);
    expect(isEthicsCourse('Code of Conduct Refresher')).toBe(true);
    expect(isEthicsCourse('Lease Accounting')).toBe(false);
  });
});
