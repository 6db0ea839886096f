import { asArray, asRecord, isRecord, toAmount, toIsoDate, toPositiveAmount, toText } from '../../domain/values.js';
import { logger } from '../../infrastructure/logger.js';
import type { DocumentKind, RawRecord } from '../../domain/types.js';
import type { ConfidenceCheck, ConfidenceResult } from './types.js';

const log = logger.child({ module: 'confidence' });

const MAX_POINTS = 100;

/** Records assembled without the vision model never score above the fallback baseline. */
export const HEURISTIC_CONFIDENCE_CAP = 0.6;

const MIN_TEXT_LENGTH = 100;

export const PLACEHOLDER_NAMES = ['Unknown Company', 'Unknown Employee'] as const;

function hasName(value: unknown): boolean {
  const name = toText(value);
  return name !== null && !PLACEHOLDER_NAMES.some((placeholder) => placeholder === name);
}

const TAX_YEAR_PATTERN = /^\d{4}$/;

/** Line items the schema keeps: those with a usable current amount. */
function hasLines(value: unknown): boolean {
  return asArray(value).some((line) => isRecord(line) && toAmount(line.current_amount) !== null);
}

function hasBenefitCodes(value: unknown): boolean {
  return asArray(value).some((entry) => isRecord(entry) && toText(entry.code) !== null);
}

function hasTaxYear(value: unknown): boolean {
  const year = toText(value);
  return year !== null && TAX_YEAR_PATTERN.test(year);
}

function paystubChecks(record: RawRecord): ConfidenceCheck[] {
  const employer = asRecord(record.employer);
  const employee = asRecord(record.employee);
  const period = asRecord(record.payroll_period);

  return [
    { name: 'employer_name', points: 10, earned: hasName(employer.company_name) },
    { name: 'employee_name', points: 10, earned: hasName(employee.name) },
    { name: 'pay_date', points: 10, earned: toIsoDate(period.pay_date) !== null },
    { name: 'gross_pay', points: 15, earned: toPositiveAmount(record.gross_pay_current) !== null },
    { name: 'net_pay', points: 15, earned: toPositiveAmount(record.net_pay_current) !== null },
    { name: 'earnings_lines', points: 10, earned: hasLines(record.earnings) },
    { name: 'tax_lines', points: 10, earned: hasLines(record.taxes) },
    { name: 'deduction_lines', points: 10, earned: hasLines(record.deductions) },
  ];
}

function w2Checks(record: RawRecord): ConfidenceCheck[] {
  const employer = asRecord(record.employer);
  const employee = asRecord(record.employee);
  const info = asRecord(record.income_tax_info);

  return [
    { name: 'employer_name', points: 10, earned: hasName(employer.name) },
    { name: 'employee_name', points: 10, earned: hasName(employee.name) },
    { name: 'tax_year', points: 10, earned: hasTaxYear(record.tax_year) },
    { name: 'wages', points: 15, earned: toPositiveAmount(info.wages_tips_compensation) !== null },
    { name: 'federal_withholding', points: 15, earned: toPositiveAmount(info.federal_income_tax_withheld) !== null },
    { name: 'box_12_codes', points: 10, earned: hasBenefitCodes(info.box_12_codes) },
    {
      name: 'social_security_medicare_wages',
      points: 10,
      earned:
        toPositiveAmount(info.social_security_wages) !== null || toPositiveAmount(info.medicare_wages_tips) !== null,
    },
    { name: 'state_lines', points: 10, earned: asArray(record.state_local_info).some(isRecord) },
  ];
}

function processingChecks(record: RawRecord): ConfidenceCheck[] {
  const metadata = asRecord(record.processing_metadata);
  const tablesFound = typeof metadata.tables_found === 'number' ? metadata.tables_found : 0;
  const textLength = typeof metadata.text_length === 'number' ? metadata.text_length : 0;

  return [
    { name: 'vision_used', points: 5, earned: metadata.gpt_vision_used === true },
    { name: 'tables_found', points: 3, earned: tablesFound > 0 },
    { name: 'text_length', points: 2, earned: textLength > MIN_TEXT_LENGTH },
  ];
}

/**
 * Point-based completeness score in [0, 1]. It measures how much of the
 * document structure was recovered and by how many methods, not whether the
 * values are right: nothing here has ground truth to compare against.
 * Fields are read with the coercions the record schema applies, so values the
 * schema drops earn nothing.
 */
export function computeConfidence(kind: DocumentKind, record: RawRecord): ConfidenceResult {
  const checks = [...(kind === 'w2' ? w2Checks(record) : paystubChecks(record)), ...processingChecks(record)];
  const points = checks.reduce((sum, check) => sum + (check.earned ? check.points : 0), 0);

  const visionUsed = asRecord(record.processing_metadata).gpt_vision_used === true;
  const uncapped = Math.min(points / MAX_POINTS, 1);
  const score = visionUsed ? uncapped : Math.min(uncapped, HEURISTIC_CONFIDENCE_CAP);

  log.debug({ documentKind: kind, points, score, visionUsed }, 'Confidence computed');

  return { score, points, checks };
}
