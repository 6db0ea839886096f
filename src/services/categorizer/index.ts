import { containsAnyPhrase, toText } from '../../domain/values.js';
import { EMPLOYER_CONTRIBUTION_KEYWORDS, PRE_TAX_KEYWORDS } from './keywords.js';

export { EMPLOYER_CONTRIBUTION_KEYWORDS, PRE_TAX_KEYWORDS } from './keywords.js';

/** Typed lines and raw model output alike; a missing description matches nothing. */
interface DescribedLine {
  description?: unknown;
}

export function isEmployerContribution(description: unknown): boolean {
  return containsAnyPhrase(toText(description) ?? '', EMPLOYER_CONTRIBUTION_KEYWORDS);
}

/**
 * Flags earnings lines paid by the employer (401k match, ER cost, ...). Returns
 * new line objects in the same order; only `is_employer_contribution` changes,
 * so applying it twice gives the same result.
 */
export function categorizeEarnings<T extends DescribedLine>(
  lines: readonly T[],
): Array<T & { is_employer_contribution: boolean }> {
  return lines.map((line) => ({
    ...line,
    is_employer_contribution: isEmployerContribution(line.description),
  }));
}

/**
 * Marks deductions taken before tax when the source did not say. An explicit
 * `is_pre_tax` from the document is kept as printed.
 */
export function markPreTaxDeductions<T extends DescribedLine & { is_pre_tax?: unknown }>(
  lines: readonly T[],
): Array<T & { is_pre_tax: boolean }> {
  return lines.map((line) => ({
    ...line,
    is_pre_tax:
      typeof line.is_pre_tax === 'boolean'
        ? line.is_pre_tax
        : containsAnyPhrase(toText(line.description) ?? '', PRE_TAX_KEYWORDS),
  }));
}
