import { describe, it, expect } from 'vitest';
import { documentKindSchema, paystubRecordSchema, w2RecordSchema } from '../../src/domain/schemas.js';
import type { ProcessingMetadata } from '../../src/domain/types.js';

const metadata: ProcessingMetadata = {
  extraction_method: 'multi_modal_ai_enhanced',
  gpt_vision_used: true,
  tables_found: 1,
  table_strategy: 'lattice',
  text_length: 500,
  page_count: 1,
  pipeline_states: [],
};

function paystub(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    document_type: 'paystub',
    employer: { company_name: 'Acme Widgets Inc', address: null, employee_id: 'E1001' },
    employee: { name: 'Jane Doe', address: null, ssn_masked: 'XXX-XX-1234' },
    payroll_period: { start_date: '01/01/2024', end_date: '2024-01-14', pay_date: '01/19/2024' },
    gross_pay_current: '$4,500.00',
    gross_pay_ytd: null,
    net_pay_current: 3200,
    net_pay_ytd: null,
    earnings: [
      { description: 'Regular Pay', rate: 56.25, hours: 80, current_amount: 4500, ytd_amount: 4500, is_employer_contribution: false },
    ],
    deductions: [],
    taxes: [],
    total_hours_current: 80,
    pay_frequency: 'Bi-Weekly',
    monthly_qualifying_income: 9750,
    income_basis: 'bi-weekly',
    confidence_score: 0.95,
    validation_warnings: [],
    processing_metadata: metadata,
    ...overrides,
  };
}

describe('documentKindSchema', () => {
  it('accepts the two document kinds', () => {
    expect(documentKindSchema.safeParse('paystub').success).toBe(true);
    expect(documentKindSchema.safeParse('w2').success).toBe(true);
    expect(documentKindSchema.safeParse('1099').success).toBe(false);
  });
});

describe('paystubRecordSchema', () => {
  it('coerces printed amounts, dates and frequencies', () => {
    const result = paystubRecordSchema.safeParse(paystub());
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.gross_pay_current).toBe(4500);
    expect(result.data.payroll_period.start_date).toBe('2024-01-01');
    expect(result.data.payroll_period.pay_date).toBe('2024-01-19');
    expect(result.data.pay_frequency).toBe('bi-weekly');
  });

  it('drops line items without a valid current amount', () => {
    const result = paystubRecordSchema.safeParse(
      paystub({
        deductions: [
          { description: 'Dental', current_amount: 'n/a', ytd_amount: null, is_pre_tax: true },
          { description: 'Health Insurance', current_amount: '120.00', ytd_amount: null, is_pre_tax: true },
        ],
      }),
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.deductions).toEqual([
      { description: 'Health Insurance', current_amount: 120, ytd_amount: null, is_pre_tax: true },
    ]);
  });

  it('turns a negative optional amount into null', () => {
    const result = paystubRecordSchema.safeParse(paystub({ gross_pay_ytd: -10 }));
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.gross_pay_ytd).toBeNull();
  });

  it('rejects a record without gross pay', () => {
    const result = paystubRecordSchema.safeParse(paystub({ gross_pay_current: null }));
    expect(result.success).toBe(false);
  });

  it('rejects a confidence score outside [0, 1]', () => {
    const result = paystubRecordSchema.safeParse(paystub({ confidence_score: 1.5 }));
    expect(result.success).toBe(false);
  });

  it('falls back to unknown for an unrecognized frequency', () => {
    const result = paystubRecordSchema.safeParse(paystub({ pay_frequency: 'every full moon' }));
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.pay_frequency).toBe('unknown');
  });
});

describe('w2RecordSchema', () => {
  const w2 = {
    document_type: 'w2',
    tax_year: 2024,
    employee: { name: 'Jane Doe', ssn: 'XXX-XX-1234', address: '1 Main St, Springfield, IL 62701' },
    employer: { name: 'Acme Widgets Inc', ein: '12-3456789' },
    income_tax_info: {
      wages_tips_compensation: '85,000.00',
      box_12_codes: [{ code: 'd', amount: '5000' }, { amount: 10 }],
      retirement_plan: 'X',
    },
    state_local_info: [{ state: 'IL', state_wages: 85000 }],
    calculated_income: {
      primary_income: 85000,
      social_security_wages: null,
      medicare_wages: null,
      annual_income: 85000,
      monthly_income: 7083.33,
      income_verification_method: 'box_1_wages',
      additional_benefits: 5000,
    },
    confidence_score: 0.8,
    validation_warnings: [],
    processing_metadata: metadata,
  };

  it('fills absent boxes with null and normalizes codes', () => {
    const result = w2RecordSchema.safeParse(w2);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.tax_year).toBe('2024');
    expect(result.data.employee.address).toEqual({
      street: null,
      city: null,
      state: null,
      zip: null,
      full_address: '1 Main St, Springfield, IL 62701',
    });
    expect(result.data.income_tax_info.wages_tips_compensation).toBe(85000);
    expect(result.data.income_tax_info.federal_income_tax_withheld).toBeNull();
    expect(result.data.income_tax_info.box_12_codes).toEqual([{ code: 'D', amount: 5000 }]);
    expect(result.data.income_tax_info.retirement_plan).toBe(true);
    expect(result.data.income_tax_info.statutory_employee).toBe(false);
    expect(result.data.state_local_info[0]?.local_wages).toBeNull();
  });

  it('drops a tax year that is not four digits', () => {
    const result = w2RecordSchema.safeParse({ ...w2, tax_year: '24' });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.tax_year).toBeNull();
  });
});
