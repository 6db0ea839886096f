import { z } from 'zod';
import { DOCUMENT_KINDS, PAY_FREQUENCIES, PIPELINE_STATES, TABLE_STRATEGIES } from './types.js';
import {
  asArray,
  isRecord,
  normalizePayFrequency,
  toAmount,
  toFlag,
  toIsoDate,
  toText,
} from './values.js';

export const documentKindSchema = z.enum(DOCUMENT_KINDS);

export const pipelineStateSchema = z.enum(PIPELINE_STATES);

const amount = z.preprocess(toAmount, z.number().nonnegative().nullable());

const requiredAmount = z.preprocess(
  toAmount,
  z.number({
    required_error: 'Amount is required',
    invalid_type_error: 'Expected a non-negative amount',
  }).nonnegative(),
);

const text = z.preprocess(toText, z.string().nullable());

const requiredText = z.preprocess(
  toText,
  z.string({ invalid_type_error: 'Expected non-empty text' }),
);

const isoDate = z.preprocess(toIsoDate, z.string().nullable());

const flag = z.preprocess(toFlag, z.boolean());

export const addressSchema = z.object({
  street: text,
  city: text,
  state: text,
  zip: text,
  full_address: text,
});

const optionalAddress = z.preprocess((value) => {
  if (typeof value === 'string') return { full_address: value };
  return isRecord(value) ? value : null;
}, addressSchema.nullable());

/**
 * Line items without a usable current amount are dropped here; the consistency
 * checks report them as warnings before validation runs.
 */
function lineItems<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess(
    (value) => asArray(value).filter((line) => isRecord(line) && toAmount(line.current_amount) !== null),
    z.array(item),
  );
}

export const earningsLineSchema = z.object({
  description: requiredText,
  rate: amount,
  hours: amount,
  current_amount: requiredAmount,
  ytd_amount: amount,
  is_employer_contribution: flag,
});

export const deductionLineSchema = z.object({
  description: requiredText,
  current_amount: requiredAmount,
  ytd_amount: amount,
  is_pre_tax: flag,
});

export const taxLineSchema = z.object({
  tax_type: requiredText,
  current_amount: requiredAmount,
  ytd_amount: amount,
  taxable_wages_current: amount,
  taxable_wages_ytd: amount,
});

export const benefitCodeSchema = z.object({
  code: z.preprocess((value) => toText(value)?.toUpperCase() ?? null, z.string()),
  amount,
});

export const processingMetadataSchema = z
  .object({
    extraction_method: z.enum(['multi_modal_ai_enhanced', 'traditional_extraction_only']),
    gpt_vision_used: z.boolean(),
    tables_found: z.number().int().nonnegative(),
    table_strategy: z.enum(TABLE_STRATEGIES).nullable(),
    text_length: z.number().int().nonnegative(),
    page_count: z.number().int().nonnegative(),
    pipeline_states: z.array(pipelineStateSchema),
    detected_amounts: z.array(z.number()).optional(),
    detected_dates: z.array(z.string()).optional(),
    vision_model: z.string().optional(),
    vision_error: z.string().optional(),
    validation_passed: z.boolean().optional(),
    validation_error: z.string().optional(),
    validation_method: z.literal('zod').optional(),
    validation_warnings_count: z.number().int().nonnegative().optional(),
  })
  .passthrough();

const recordAnnotations = {
  confidence_score: z.number().min(0).max(1),
  validation_warnings: z.array(z.string()),
  processing_metadata: processingMetadataSchema,
};

export const paystubRecordSchema = z.object({
  document_type: z.literal('paystub'),
  employer: z.object({
    company_name: requiredText,
    address: optionalAddress,
    employee_id: text,
  }),
  employee: z.object({
    name: requiredText,
    address: optionalAddress,
    ssn_masked: text,
  }),
  payroll_period: z.preprocess(
    (value) => (isRecord(value) ? value : {}),
    z.object({
      start_date: isoDate,
      end_date: isoDate,
      pay_date: isoDate,
    }),
  ),
  gross_pay_current: requiredAmount,
  gross_pay_ytd: amount,
  net_pay_current: requiredAmount,
  net_pay_ytd: amount,
  earnings: lineItems(earningsLineSchema),
  deductions: lineItems(deductionLineSchema),
  taxes: lineItems(taxLineSchema),
  total_hours_current: amount,
  pay_frequency: z.preprocess(normalizePayFrequency, z.enum(PAY_FREQUENCIES)),
  monthly_qualifying_income: amount,
  income_basis: text,
  ...recordAnnotations,
});

export const stateLocalLineSchema = z.object({
  state: text,
  state_wages: amount,
  state_income_tax: amount,
  locality: text,
  local_wages: amount,
  local_income_tax: amount,
});

export const incomeTaxInfoSchema = z.object({
  wages_tips_compensation: amount,
  federal_income_tax_withheld: amount,
  social_security_wages: amount,
  social_security_tax_withheld: amount,
  medicare_wages_tips: amount,
  medicare_tax_withheld: amount,
  social_security_tips: amount,
  allocated_tips: amount,
  dependent_care_benefits: amount,
  nonqualified_plans: amount,
  box_12_codes: z.preprocess(
    (value) => asArray(value).filter((entry) => isRecord(entry) && toText(entry.code) !== null),
    z.array(benefitCodeSchema),
  ),
  statutory_employee: flag,
  retirement_plan: flag,
  third_party_sick_pay: flag,
});

export const calculatedIncomeSchema = z.object({
  primary_income: amount,
  social_security_wages: amount,
  medicare_wages: amount,
  annual_income: amount,
  monthly_income: amount,
  income_verification_method: z.enum([
    'box_1_wages',
    'box_3_ss_wages',
    'box_5_medicare_wages',
    'unavailable',
  ]),
  additional_benefits: amount,
});

export const w2RecordSchema = z.object({
  document_type: z.literal('w2'),
  tax_year: z.preprocess(
    (value) => {
      const year = toText(value);
      return year !== null && /^\d{4}$/.test(year) ? year : null;
    },
    z.string().nullable(),
  ),
  employee: z.preprocess(
    (value) => (isRecord(value) ? value : {}),
    z.object({
      name: text,
      ssn: text,
      address: optionalAddress,
    }),
  ),
  employer: z.preprocess(
    (value) => (isRecord(value) ? value : {}),
    z.object({
      name: text,
      ein: text,
      address: optionalAddress,
      control_number: text,
    }),
  ),
  income_tax_info: z.preprocess((value) => (isRecord(value) ? value : {}), incomeTaxInfoSchema),
  state_local_info: z.preprocess(
    (value) => asArray(value).filter(isRecord),
    z.array(stateLocalLineSchema),
  ),
  calculated_income: calculatedIncomeSchema,
  ...recordAnnotations,
});

export type Address = z.infer<typeof addressSchema>;
export type EarningsLine = z.infer<typeof earningsLineSchema>;
export type DeductionLine = z.infer<typeof deductionLineSchema>;
export type TaxLine = z.infer<typeof taxLineSchema>;
export type BenefitCode = z.infer<typeof benefitCodeSchema>;
export type StateLocalLine = z.infer<typeof stateLocalLineSchema>;
export type IncomeTaxInfo = z.infer<typeof incomeTaxInfoSchema>;
export type CalculatedIncome = z.infer<typeof calculatedIncomeSchema>;
export type PaystubRecord = z.infer<typeof paystubRecordSchema>;
export type W2Record = z.infer<typeof w2RecordSchema>;
export type DocumentRecord = PaystubRecord | W2Record;
