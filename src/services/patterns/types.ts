import type { PayFrequency } from '../../domain/types.js';

export type LineCategory = 'earnings' | 'deduction' | 'tax';

/** A payroll row recognized in plain text: a description plus its amounts. */
export interface DetectedLine {
  category: LineCategory;
  description: string;
  currentAmount: number;
  ytdAmount: number | null;
  hours: number | null;
  rate: number | null;
}

export type W2BoxField =
  | 'wagesTipsCompensation'
  | 'federalIncomeTaxWithheld'
  | 'socialSecurityWages'
  | 'socialSecurityTaxWithheld'
  | 'medicareWagesTips'
  | 'medicareTaxWithheld';

export interface DetectedBenefitCode {
  code: string;
  amount: number;
}

/**
 * Fields recognized by regular expressions over a text blob. Everything but the
 * detected amount and date lists is optional: unmatched fields are absent.
 */
export interface HeuristicFields {
  detectedAmounts: number[];
  detectedDates: string[];
  employeeSsn?: string;
  employerEin?: string;
  employeeId?: string;
  payFrequency?: PayFrequency;
  companyName?: string;
  employeeName?: string;
  taxYear?: string;
  payDate?: string;
  periodStart?: string;
  periodEnd?: string;
  grossPayCurrent?: number;
  grossPayYtd?: number;
  netPayCurrent?: number;
  netPayYtd?: number;
  w2Boxes?: Partial<Record<W2BoxField, number>>;
  box12Codes?: DetectedBenefitCode[];
  lineItems?: DetectedLine[];
}

