import { describe, it, expect } from 'vitest';
import {
  categorizeEarnings,
  isEmployerContribution,
  markPreTaxDeductions,
} from '../../src/services/categorizer/index.js';

describe('isEmployerContribution', () => {
  it('recognizes employer-paid items', () => {
    expect(isEmployerContribution('401(k) Match')).toBe(true);
    expect(isEmployerContribution('ER Cost - Medical')).toBe(true);
    expect(isEmployerContribution('Company Paid Life')).toBe(true);
    expect(isEmployerContribution('EMPLOYER HSA')).toBe(true);
  });

  it('leaves employee pay alone', () => {
    expect(isEmployerContribution('Regular Pay')).toBe(false);
    expect(isEmployerContribution('Other cost')).toBe(false);
    expect(isEmployerContribution(null)).toBe(false);
  });
});

describe('categorizeEarnings', () => {
  const lines = [
    { description: 'Regular Pay', current_amount: 4500, is_employer_contribution: true },
    { description: '401k Match', current_amount: 200 },
    { description: 'Holiday', current_amount: 300, is_employer_contribution: false },
  ];

  it('sets the flag from the description', () => {
    expect(categorizeEarnings(lines).map((line) => line.is_employer_contribution)).toEqual([false, true, false]);
  });

  it('keeps the other fields and the order', () => {
    expect(categorizeEarnings(lines).map((line) => [line.description, line.current_amount])).toEqual([
      ['Regular Pay', 4500],
      ['401k Match', 200],
      ['Holiday', 300],
    ]);
  });

  it('gives the same result when applied twice', () => {
    const once = categorizeEarnings(lines);
    expect(categorizeEarnings(once)).toEqual(once);
  });

  it('does not modify its input', () => {
    categorizeEarnings(lines);
    expect(lines[0]?.is_employer_contribution).toBe(true);
    expect(lines[1]).toEqual({ description: '401k Match', current_amount: 200 });
  });
});

describe('markPreTaxDeductions', () => {
  it('infers pre-tax status unless the document gave it', () => {
    const marked = markPreTaxDeductions([
      { description: '401k', is_pre_tax: false },
      { description: 'Dental Insurance' },
      { description: 'Union Dues' },
      { description: 'Roth Contribution', is_pre_tax: 'yes' },
    ]);
    expect(marked.map((line) => line.is_pre_tax)).toEqual([false, true, false, false]);
  });
});
