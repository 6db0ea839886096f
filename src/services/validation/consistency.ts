import { asArray, asRecord, isRecord, roundCents, toAmount, toFlag, toPositiveAmount, toText } from '../../domain/values.js';
import type { DocumentKind, RawRecord } from '../../domain/types.js';
import type { ValidationPolicy } from '../../infrastructure/config.js';

const SOCIAL_SECURITY_RATE = 0.062;
const MEDICARE_RATE = 0.0145;
const WITHHOLDING_TOLERANCE_FLOOR = 10;
const WITHHOLDING_TOLERANCE_RATIO = 0.02;

function money(value: number): string {
  return value.toFixed(2);
}

function sumOf(values: number[]): number {
  return roundCents(values.reduce((sum, value) => sum + value, 0));
}

/** Lines without a usable current amount are dropped by the schema; say so before it happens. */
function droppedLineWarnings(record: RawRecord): string[] {
  const sections = [
    ['Earnings', 'earnings', 'description'],
    ['Deduction', 'deductions', 'description'],
    ['Tax', 'taxes', 'tax_type'],
  ] as const;

  return sections.flatMap(([label, key, descriptionKey]) =>
    asArray(record[key])
      .filter(isRecord)
      .flatMap((line, index) => {
        if (toAmount(line.current_amount) !== null) return [];
        const description = toText(line[descriptionKey]) ?? 'unnamed';
        return [`${label} line ${index + 1} (${description}) has no valid current amount and was dropped`];
      }),
  );
}

export function checkPaystubConsistency(record: RawRecord, policy: ValidationPolicy): string[] {
  const warnings: string[] = [];
  const gross = toPositiveAmount(record.gross_pay_current);
  const net = toPositiveAmount(record.net_pay_current);

  if (gross === null) warnings.push('Missing gross pay current amount');
  if (net === null) warnings.push('Missing net pay current amount');

  if (gross !== null && net !== null && net >= gross) {
    warnings.push('Net pay is greater than or equal to gross pay - check deductions');
  }

  const earnings = asArray(record.earnings).filter(isRecord);
  if (gross !== null && earnings.length > 0) {
    const tolerance = Math.max(policy.earningsToleranceFloor, gross * policy.earningsToleranceRatio);
    const amountOf = (line: Record<string, unknown>): number => toAmount(line.current_amount) ?? 0;

    const employeeTotal = sumOf(earnings.filter((line) => !toFlag(line.is_employer_contribution)).map(amountOf));
    const total = sumOf(earnings.map(amountOf));

    const employeeDifference = roundCents(Math.abs(employeeTotal - gross));
    if (employeeDifference > tolerance) {
      warnings.push(
        `Employee earnings total (${money(employeeTotal)}) doesn't match gross pay (${money(gross)}) - difference: $${money(employeeDifference)}`,
      );
    }

    const totalDifference = roundCents(Math.abs(total - gross));
    if (total !== employeeTotal && totalDifference > tolerance) {
      warnings.push(
        `Total earnings (${money(total)}) includes employer contributions and doesn't match gross pay (${money(gross)}) - difference: $${money(totalDifference)}`,
      );
    }
  }

  if (gross !== null && gross < policy.grossPlausibleMin) {
    warnings.push('Gross pay seems unusually low');
  }
  if (gross !== null && gross > policy.grossPlausibleMax) {
    warnings.push('Gross pay seems unusually high for a single pay period');
  }

  const grossYtd = toPositiveAmount(record.gross_pay_ytd);
  if (gross !== null && grossYtd !== null && grossYtd < gross) {
    warnings.push(`Gross pay YTD (${money(grossYtd)}) is lower than current gross pay (${money(gross)})`);
  }

  return [...warnings, ...droppedLineWarnings(record)];
}

function withinWithholdingTolerance(actual: number, expected: number): boolean {
  return Math.abs(actual - expected) <= Math.max(WITHHOLDING_TOLERANCE_FLOOR, expected * WITHHOLDING_TOLERANCE_RATIO);
}

export function checkW2Consistency(record: RawRecord): string[] {
  const warnings: string[] = [];
  const info = asRecord(record.income_tax_info);
  const wages = toPositiveAmount(info.wages_tips_compensation);
  const federalWithheld = toPositiveAmount(info.federal_income_tax_withheld);
  const ssWages = toPositiveAmount(info.social_security_wages);
  const ssTax = toPositiveAmount(info.social_security_tax_withheld);
  const medicareWages = toPositiveAmount(info.medicare_wages_tips);
  const medicareTax = toPositiveAmount(info.medicare_tax_withheld);

  if (wages === null) warnings.push('Missing wages, tips, other compensation (box 1)');

  if (wages !== null && federalWithheld !== null && federalWithheld > wages) {
    warnings.push('Federal income tax withheld exceeds wages - check box 1 and box 2');
  }

  if (ssWages !== null && ssTax !== null) {
    const expected = roundCents(ssWages * SOCIAL_SECURITY_RATE);
    if (!withinWithholdingTolerance(ssTax, expected)) {
      warnings.push(
        `Social security tax withheld (${money(ssTax)}) is not 6.2% of social security wages (expected ${money(expected)})`,
      );
    }
  }

  // Additional Medicare tax legitimately raises the withholding, so only a shortfall is reported.
  if (medicareWages !== null && medicareTax !== null) {
    const expected = roundCents(medicareWages * MEDICARE_RATE);
    if (medicareTax < expected && !withinWithholdingTolerance(medicareTax, expected)) {
      warnings.push(
        `Medicare tax withheld (${money(medicareTax)}) is below 1.45% of Medicare wages (expected ${money(expected)})`,
      );
    }
  }

  return warnings;
}

/** Cross-field checks. Every finding is advisory: a warning string, never an error. */
export function checkConsistency(kind: DocumentKind, record: RawRecord, policy: ValidationPolicy): string[] {
  return kind === 'w2' ? checkW2Consistency(record) : checkPaystubConsistency(record, policy);
}
