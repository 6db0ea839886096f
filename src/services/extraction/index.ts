import type { DocumentKind, DraftRecord, RawRecord } from '../../domain/types.js';
import { roundCents } from '../../domain/values.js';
import { mergeHeuristicFields, type DetectedLine, type HeuristicFields } from '../patterns/index.js';
import type { TableResult } from '../table-extraction/index.js';
import type { TextResult } from '../text-extraction/index.js';
import { PLACEHOLDER_NAMES } from './confidence.js';
import { buildProcessingMetadata } from './metadata.js';

export { computeConfidence, HEURISTIC_CONFIDENCE_CAP, PLACEHOLDER_NAMES } from './confidence.js';
export { buildProcessingMetadata } from './metadata.js';
export type { VisionSummary } from './metadata.js';
export type { ConfidenceCheck, ConfidenceResult } from './types.js';

/** Nominal score of a heuristic-only record; the scorer recomputes the real one. */
const FALLBACK_CONFIDENCE = 0.6;

const [UNKNOWN_COMPANY, UNKNOWN_EMPLOYEE] = PLACEHOLDER_NAMES;

export function maskSsn(ssn: string | undefined): string | null {
  if (!ssn) return null;
  const lastFour = /(\d{4})$/.exec(ssn)?.[1];
  return lastFour ? `XXX-XX-${lastFour}` : null;
}

function linesOf(category: DetectedLine['category'], lines: DetectedLine[]): DetectedLine[] {
  return lines.filter((line) => line.category === category);
}

function paystubFields(fields: HeuristicFields, lineItems: DetectedLine[]): RawRecord {
  const hours = linesOf('earnings', lineItems)
    .map((line) => line.hours)
    .filter((value): value is number => value !== null);

  return {
    document_type: 'paystub',
    employer: {
      company_name: fields.companyName ?? UNKNOWN_COMPANY,
      address: null,
      employee_id: fields.employeeId ?? null,
    },
    employee: {
      name: fields.employeeName ?? UNKNOWN_EMPLOYEE,
      address: null,
      ssn_masked: maskSsn(fields.employeeSsn),
    },
    payroll_period: {
      start_date: fields.periodStart ?? null,
      end_date: fields.periodEnd ?? null,
      pay_date: fields.payDate ?? null,
    },
    gross_pay_current: fields.grossPayCurrent ?? null,
    gross_pay_ytd: fields.grossPayYtd ?? null,
    net_pay_current: fields.netPayCurrent ?? null,
    net_pay_ytd: fields.netPayYtd ?? null,
    earnings: linesOf('earnings', lineItems).map((line) => ({
      description: line.description,
      rate: line.rate,
      hours: line.hours,
      current_amount: line.currentAmount,
      ytd_amount: line.ytdAmount,
      is_employer_contribution: false,
    })),
    deductions: linesOf('deduction', lineItems).map((line) => ({
      description: line.description,
      current_amount: line.currentAmount,
      ytd_amount: line.ytdAmount,
    })),
    taxes: linesOf('tax', lineItems).map((line) => ({
      tax_type: line.description,
      current_amount: line.currentAmount,
      ytd_amount: line.ytdAmount,
      taxable_wages_current: null,
      taxable_wages_ytd: null,
    })),
    total_hours_current: hours.length > 0 ? roundCents(hours.reduce((sum, value) => sum + value, 0)) : null,
    pay_frequency: fields.payFrequency ?? 'unknown',
  };
}

function w2Fields(fields: HeuristicFields): RawRecord {
  const boxes = fields.w2Boxes ?? {};
  return {
    document_type: 'w2',
    tax_year: fields.taxYear ?? null,
    employee: {
      name: fields.employeeName ?? null,
      ssn: maskSsn(fields.employeeSsn),
      address: null,
    },
    employer: {
      name: fields.companyName ?? null,
      ein: fields.employerEin ?? null,
      address: null,
      control_number: null,
    },
    income_tax_info: {
      wages_tips_compensation: boxes.wagesTipsCompensation ?? null,
      federal_income_tax_withheld: boxes.federalIncomeTaxWithheld ?? null,
      social_security_wages: boxes.socialSecurityWages ?? null,
      social_security_tax_withheld: boxes.socialSecurityTaxWithheld ?? null,
      medicare_wages_tips: boxes.medicareWagesTips ?? null,
      medicare_tax_withheld: boxes.medicareTaxWithheld ?? null,
      social_security_tips: null,
      allocated_tips: null,
      dependent_care_benefits: null,
      nonqualified_plans: null,
      box_12_codes: (fields.box12Codes ?? []).map((entry) => ({ code: entry.code, amount: entry.amount })),
      statutory_employee: false,
      retirement_plan: false,
      third_party_sick_pay: false,
    },
    state_local_info: [],
  };
}

/**
 * Assembles a record from the table and text adapters alone, used when the
 * vision stage is unavailable or fails. Text fields win over table fields for
 * single values; line items come from whichever source recognized any,
 * preferring text, so rows seen by both are not counted twice.
 */
export function formatHeuristicRecord(
  kind: DocumentKind,
  tableResult: TableResult,
  textResult: TextResult,
  visionError?: string,
): DraftRecord {
  const fields = mergeHeuristicFields(textResult.heuristicFields, tableResult.heuristicFields);
  const lineItems = textResult.heuristicFields.lineItems ?? tableResult.heuristicFields.lineItems ?? [];
  const box12Codes = textResult.heuristicFields.box12Codes ?? tableResult.heuristicFields.box12Codes;
  const sourceFields: HeuristicFields = { ...fields, ...(box12Codes !== undefined && { box12Codes }) };

  const metadata = {
    ...buildProcessingMetadata(tableResult, textResult, {
      used: false,
      ...(visionError !== undefined && { error: visionError }),
    }),
    detected_amounts: fields.detectedAmounts,
    detected_dates: fields.detectedDates,
  };

  return {
    fields: {
      ...(kind === 'w2' ? w2Fields(sourceFields) : paystubFields(sourceFields, lineItems)),
      confidence_score: FALLBACK_CONFIDENCE,
      validation_warnings: [],
    },
    metadata,
  };
}
