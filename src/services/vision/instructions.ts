import type { DocumentKind } from '../../domain/types.js';
import type { TableResult } from '../table-extraction/index.js';
import type { TextResult } from '../text-extraction/index.js';

const MAX_CONTEXT_TABLES = 5;
const MAX_CONTEXT_ROWS = 40;
const MAX_CONTEXT_TEXT = 4000;

const ADDRESS_EXAMPLE = { street: '123 Main St', city: 'Springfield', state: 'IL', zip: '62701' };

const PAYSTUB_EXAMPLE = {
  document_type: 'paystub',
  employer: { company_name: 'Example Corp', address: ADDRESS_EXAMPLE, employee_id: 'E1001' },
  employee: { name: 'Jane Doe', address: ADDRESS_EXAMPLE, ssn_masked: 'XXX-XX-1234' },
  payroll_period: { start_date: '2024-01-01', end_date: '2024-01-14', pay_date: '2024-01-19' },
  gross_pay_current: 4500.0,
  gross_pay_ytd: 4500.0,
  net_pay_current: 3200.0,
  net_pay_ytd: 3200.0,
  earnings: [
    {
      description: 'Regular Pay',
      rate: 56.25,
      hours: 80.0,
      current_amount: 4500.0,
      ytd_amount: 4500.0,
      is_employer_contribution: false,
    },
  ],
  deductions: [{ description: 'Health Insurance', current_amount: 120.0, ytd_amount: 120.0, is_pre_tax: true }],
  taxes: [
    {
      tax_type: 'Federal Income Tax',
      current_amount: 540.0,
      ytd_amount: 540.0,
      taxable_wages_current: 4380.0,
      taxable_wages_ytd: 4380.0,
    },
  ],
  total_hours_current: 80.0,
  pay_frequency: 'bi-weekly',
};

const W2_EXAMPLE = {
  document_type: 'w2',
  tax_year: '2024',
  employee: { name: 'Jane Doe', ssn: 'XXX-XX-1234', address: ADDRESS_EXAMPLE },
  employer: { name: 'Example Corp', ein: '12-3456789', address: ADDRESS_EXAMPLE, control_number: null },
  income_tax_info: {
    wages_tips_compensation: 85000.0,
    federal_income_tax_withheld: 12000.0,
    social_security_wages: 90000.0,
    social_security_tax_withheld: 5580.0,
    medicare_wages_tips: 90000.0,
    medicare_tax_withheld: 1305.0,
    social_security_tips: null,
    allocated_tips: null,
    dependent_care_benefits: null,
    nonqualified_plans: null,
    box_12_codes: [{ code: 'D', amount: 5000.0 }],
    statutory_employee: false,
    retirement_plan: true,
    third_party_sick_pay: false,
  },
  state_local_info: [
    {
      state: 'IL',
      state_wages: 85000.0,
      state_income_tax: 4207.5,
      locality: null,
      local_wages: null,
      local_income_tax: null,
    },
  ],
};

const SHARED_RULES = [
  'Use the preliminary data as a hint only; when it disagrees with the page image, trust the image.',
  'Write every monetary value as a bare number: no currency signs, no thousands separators.',
  'Write every date as YYYY-MM-DD.',
  'Use null for any field that is not visible on the document. Do not guess values.',
  'Never report a negative amount; leave the field null instead.',
];

const PAYSTUB_RULES = [
  ...SHARED_RULES,
  'Read the standard paystub sections: employer and employee details, pay period, earnings, deductions, taxes and net pay.',
  'For each earnings line give description, rate, hours, current amount, year-to-date amount and is_employer_contribution.',
  'Set is_employer_contribution to true for every employer-paid item: 401(k) or retirement match, employer HSA or FSA funding, employer-paid insurance, and any line labelled "ER cost", "employer contribution" or "company paid".',
  'For each deduction give description, current amount, year-to-date amount and whether it is taken before tax.',
  'For each tax give the tax type, current amount, year-to-date amount and the taxable wages when printed.',
  'gross_pay_current is the printed gross pay for this period. Holiday pay, bonuses and other additions belong in earnings even when they do not add up to it.',
  'total_hours_current is the sum of the hours across the earnings lines.',
  'pay_frequency is one of weekly, bi-weekly, semi-monthly, monthly, quarterly, annual or unknown.',
  'Take the company name from the document header and the employee name from the employee section.',
  'Return only the JSON object, with no text before or after it.',
];

const W2_RULES = [
  ...SHARED_RULES,
  'Identify fields by their box numbers (1-20) on the form.',
  'Keep social security numbers masked as printed (XXX-XX-1234 or *****1234).',
  'List every box 12 entry with its code (A, B, C, D, DD, W, ...) and amount.',
  'Read the box 13 checkboxes into statutory_employee, retirement_plan and third_party_sick_pay.',
  'Put state and local details from boxes 15-20 into state_local_info, one entry per state line.',
  'Return only the JSON object, with no text before or after it.',
];

function preliminaryData(tableResult: TableResult, textResult: TextResult): Record<string, unknown> {
  return {
    tables: {
      extraction_method: tableResult.extractionMethod,
      table_count: tableResult.tableCount,
      tables: tableResult.tables.slice(0, MAX_CONTEXT_TABLES).map((table) => ({
        page: table.page,
        quality: table.quality,
        rows: table.rows.slice(0, MAX_CONTEXT_ROWS),
      })),
      detected_fields: tableResult.heuristicFields,
    },
    text: {
      extraction_method: textResult.extractionMethod,
      page_count: textResult.pageCount,
      text: textResult.fullText.slice(0, MAX_CONTEXT_TEXT),
      detected_fields: textResult.heuristicFields,
    },
  };
}

function numbered(rules: readonly string[]): string {
  return rules.map((rule, index) => `${index + 1}. ${rule}`).join('\n');
}

/**
 * The single instruction sent with the page image: the target JSON shape with
 * example values, the adapters' preliminary results, and the extraction rules.
 */
export function buildInstruction(kind: DocumentKind, tableResult: TableResult, textResult: TextResult): string {
  const label = kind === 'w2' ? 'W-2 wage and tax statement' : 'paystub';
  const example = kind === 'w2' ? W2_EXAMPLE : PAYSTUB_EXAMPLE;
  const rules = kind === 'w2' ? W2_RULES : PAYSTUB_RULES;

  return [
    `Extract every field of this ${label}. The layout may come from any payroll provider.`,
    'Preliminary data from table and text extraction follows. It may be incomplete or wrong; verify it against the page image.',
    '',
    'PRELIMINARY DATA:',
    JSON.stringify(preliminaryData(tableResult, textResult), null, 2),
    '',
    'Return a JSON object with exactly this structure (example values shown):',
    JSON.stringify(example, null, 2),
    '',
    'RULES:',
    numbered(rules),
  ].join('\n');
}
