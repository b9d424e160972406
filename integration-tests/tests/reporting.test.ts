/**
 * Submission reporting: summary, CSV and filenames
 */

import {
  summarizePayloads,
  toBrokerCsv,
  suggestCertificateFilename,
  sanitizeFilename,
  COMPUTER_BASED_COURSE_TYPE,
} from '@ce-intake/shared';
import type { BrokerPayload, VerifiedCourseRecord } from '@ce-intake/shared';

const LIVE = 'Live (Involves live interaction with presenter/host)';

const debt: BrokerPayload = {
  form_version: '2024.1',
  organization_id: 'org-test',
  licensee_id: 'lic-test',
  category: 'General CPE',
  course_type: COMPUTER_BASED_COURSE_TYPE,
  completion_date: '06/06/2025',
  hours: 2,
  course_name: 'Debt: Selected Debt Related Issues',
  course_code: 'M116-2025-01-SSDL',
  provider_name: 'Acme Learning LLC',
  sponsor_id: '112530',
  field_of_study: 'Taxes',
  subjects: ['Taxes'],
};

const ethics: BrokerPayload = {
  ...debt,
  category: 'Professional Ethics CPE',
  course_type: LIVE,
  hours: 4,
  course_name: 'Regulatory Ethics for CPAs',
  course_code: 'ETH-400',
  field_of_study: 'Ethics (Regulatory)',
  subjects: ['Administrative practices'],
};

const marketing: BrokerPayload = {
  ...debt,
  hours: 1.5,
  course_name: 'Leases, Revenue and "Other" Topics',
  course_code: 'MKT-15',
  sponsor_id: null,
  field_of_study: 'Communications and Marketing',
  subjects: ['Communications', 'Marketing'],
};

const record: VerifiedCourseRecord = {
  status: 'verified',
  course_name: 'Debt: Selected Debt Related Issues',
  course_code: 'M116-2025-01-SSDL',
  field_of_study: 'Taxes',
  credits: 2,
  completion_date: '2025-06-06',
  provider_name: null,
  sponsor_id: null,
  delivery_method: null,
};

describe('summarizePayloads', () => {
  it('should total hours by category and subject', () => {
    expect(summarizePayloads([debt, ethics, marketing])).toEqual({
      total_submissions: 3,
      total_hours: 7.5,
      ethics_hours: 4,
      general_hours: 3.5,
      by_category: {
        'General CPE': { count: 2, hours: 3.5 },
        'Professional Ethics CPE': { count: 1, hours: 4 },
      },
      by_subject: {
        Taxes: { count: 1, hours: 2 },
        'Administrative practices': { count: 1, hours: 4 },
        Communications: { count: 1, hours: 1.5 },
        Marketing: { count: 1, hours: 1.5 },
      },
    });
  });

  it('should summarize an empty batch', () => {
    expect(summarizePayloads([])).toEqual({
      total_submissions: 0,
      total_hours: 0,
      ethics_hours: 0,
      general_hours: 0,
      by_category: {},
      by_subject: {},
    });
  });
});

describe('toBrokerCsv', () => {
  it('should write a header and one row per payload', () => {
    expect(toBrokerCsv([debt]).split('\r\n')).toEqual([
      'Course Name,Provider Name,Completion Date,Credits,Delivery Method,Subject Areas,Course Code,Field of Study,NASBA Sponsor',
      'Debt: Selected Debt Related Issues,Acme Learning LLC,06/06/2025,2.0,Computer-Based Training (ie: online courses),Taxes,M116-2025-01-SSDL,Taxes,112530',
    ]);
  });

  it('should quote cells with commas and quotes', () => {
    const [, row] = toBrokerCsv([marketing]).split('\r\n');
    expect(row).toBe(
      '"Leases, Revenue and ""Other"" Topics",Acme Learning LLC,06/06/2025,1.5,Computer-Based Training (ie: online courses),"Communications, Marketing",MKT-15,Communications and Marketing,'
    );
  });

  it('should say so when there is nothing to export', () => {
    expect(toBrokerCsv([])).toBe('No certificates found');
  });
});

describe('suggestCertificateFilename', () => {
  it('should combine date, credits and course name', () => {
    expect(suggestCertificateFilename(record, 'Scan 001.PDF')).toBe(
      '20250606_2CPE_Debt_Selected_Debt_Related_Issues.pdf'
    );
  });

  it('should round credits to whole hours and keep the original extension', () => {
    expect(suggestCertificateFilename({ ...record, credits: 1.5 }, 'certificate.PNG')).toBe(
      '20250606_2CPE_Debt_Selected_Debt_Related_Issues.png'
    );
    expect(suggestCertificateFilename({ ...record, credits: 2.4 })).toBe(
      '20250606_2CPE_Debt_Selected_Debt_Related_Issues.pdf'
    );
  });

  it('should default to .pdf', () => {
    expect(suggestCertificateFilename(record)).toBe('20250606_2CPE_Debt_Selected_Debt_Related_Issues.pdf');
    expect(suggestCertificateFilename(record, 'noext')).toBe(
      '20250606_2CPE_Debt_Selected_Debt_Related_Issues.pdf'
    );
  });

  it('should shorten long course names at a word boundary', () => {
    const long = {
      ...record,
      course_name: 'Comprehensive Review of Governmental Accounting and Auditing Standards for Practitioners',
    };
    expect(suggestCertificateFilename(long)).toBe('20250606_2CPE_Comprehensive_Review_of_Governmental.pdf');
  });
});

describe('sanitizeFilename', () => {
  it('should replace reserved characters and whitespace', () => {
    expect(sanitizeFilename(' a<b>c:d "e" / f ')).toBe('a_b_c_d_e_f');
  });
});
