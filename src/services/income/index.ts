import { asArray, asRecord, isRecord, normalizePayFrequency, roundCents, toAmount, toPositiveAmount } from '../../domain/values.js';
import type { PayFrequency } from '../../domain/types.js';
import type { CalculatedIncome } from '../../domain/schemas.js';

/** Pay periods per year for each recognized frequency. */
export const PERIODS_PER_YEAR: Record<Exclude<PayFrequency, 'unknown'>, number> = {
  weekly: 52,
  'bi-weekly': 26,
  'semi-monthly': 24,
  monthly: 12,
  quarterly: 4,
  annual: 1,
};

export const ASSUMED_FREQUENCY = 'bi-weekly';

export interface MonthlyIncome {
  monthlyIncome: number;
  /** The frequency the figure was derived from, or `assumed_bi-weekly`. */
  basis: string;
}

/**
 * Monthly qualifying income from one period's gross pay. Unrecognized
 * frequencies are treated as bi-weekly, the most common US schedule, and the
 * basis says so.
 */
export function calculateMonthlyQualifyingIncome(grossPay: unknown, frequency: unknown): MonthlyIncome | null {
  const gross = toPositiveAmount(grossPay);
  if (gross === null) return null;

  const normalized = normalizePayFrequency(frequency);
  if (normalized === 'unknown') {
    return {
      monthlyIncome: roundCents((gross * PERIODS_PER_YEAR[ASSUMED_FREQUENCY]) / 12),
      basis: `assumed_${ASSUMED_FREQUENCY}`,
    };
  }
  return { monthlyIncome: roundCents((gross * PERIODS_PER_YEAR[normalized]) / 12), basis: normalized };
}

type VerificationMethod = CalculatedIncome['income_verification_method'];

function selectPrimaryWages(
  wages: number | null,
  socialSecurityWages: number | null,
  medicareWages: number | null,
): [number | null, VerificationMethod] {
  if (wages !== null) return [wages, 'box_1_wages'];
  if (socialSecurityWages !== null) return [socialSecurityWages, 'box_3_ss_wages'];
  if (medicareWages !== null) return [medicareWages, 'box_5_medicare_wages'];
  return [null, 'unavailable'];
}

/**
 * Annual and monthly income from W-2 boxes: box 1 wages, falling back to
 * box 3 (social security) and then box 5 (Medicare) wages.
 */
export function calculateIncome(incomeTaxInfo: unknown): CalculatedIncome {
  const info = asRecord(incomeTaxInfo);
  const wages = toPositiveAmount(info.wages_tips_compensation);
  const socialSecurityWages = toPositiveAmount(info.social_security_wages);
  const medicareWages = toPositiveAmount(info.medicare_wages_tips);

  const benefitAmounts = asArray(info.box_12_codes)
    .filter(isRecord)
    .map((entry) => toAmount(entry.amount))
    .filter((amount): amount is number => amount !== null);
  const additionalBenefits =
    benefitAmounts.length > 0 ? roundCents(benefitAmounts.reduce((sum, amount) => sum + amount, 0)) : null;

  const [annualIncome, method] = selectPrimaryWages(wages, socialSecurityWages, medicareWages);

  return {
    primary_income: wages,
    social_security_wages: socialSecurityWages,
    medicare_wages: medicareWages,
    annual_income: annualIncome,
    monthly_income: annualIncome === null ? null : roundCents(annualIncome / 12),
    income_verification_method: method,
    additional_benefits: additionalBenefits,
  };
}
