import type { W2BoxField } from './types.js';

export const LEGAL_SUFFIXES = [
  'Inc',
  'LLC',
  'LLP',
  'Corp',
  'Co',
  'Company',
  'Group',
  'Limited',
  'Ltd',
  'Incorporated',
  'Corporation',
  'Associates',
  'Partners',
  'Enterprises',
  'Services',
  'Systems',
  'Solutions',
  'Technologies',
  'Industries',
  'Manufacturing',
  'Holdings',
  'International',
  'Global',
  'Worldwide',
] as const;

/** Words that show a candidate organization or person name is really a form label. */
export const NAME_FALSE_POSITIVES = [
  'pay',
  'statement',
  'earnings',
  'employee',
  'period',
  'date',
  'gross',
  'net',
] as const;

export const PERSON_NAME_STOPWORDS = [
  ...NAME_FALSE_POSITIVES,
  'regular',
  'overtime',
  'federal',
  'state',
  'social',
  'security',
  'medicare',
  'total',
  'current',
  'employer',
  'match',
  'deductions',
  'taxes',
  'wages',
  'income',
  'health',
  'dental',
  'vision',
  'direct',
  'deposit',
  'year',
  'form',
] as const;

export const GROSS_PAY_LABELS = [
  'gross pay',
  'gross earnings',
  'total earnings',
  'gross wages',
  'total gross',
  'gross amount',
  'gross income',
  'total compensation',
  'gross compensation',
  'total pay',
  'pay before deductions',
] as const;

export const NET_PAY_LABELS = [
  'net pay',
  'take home pay',
  'take home',
  'net earnings',
  'net wages',
  'net amount',
  'pay after deductions',
  'net income',
  'net compensation',
  'direct deposit',
] as const;

export const TAX_KEYWORDS = [
  'federal',
  'fed w/h',
  'fed tax',
  'state tax',
  'state w/h',
  'state income',
  'fica',
  'social security',
  'oasdi',
  'medicare',
  'withholding',
  'sdi',
  'local tax',
  'city tax',
  'income tax',
] as const;

export const DEDUCTION_KEYWORDS = [
  '401k',
  '401(k)',
  '403b',
  '403(b)',
  'health',
  'medical',
  'dental',
  'vision',
  'insurance',
  'hsa',
  'fsa',
  'pension',
  'retirement',
  'life',
  'disability',
  'union dues',
  'garnishment',
  'loan',
  'parking',
  'deduction',
] as const;

export const EARNINGS_KEYWORDS = [
  'regular',
  'salary',
  'base pay',
  'hourly',
  'overtime',
  'double time',
  'bonus',
  'commission',
  'incentive',
  'holiday',
  'vacation',
  'pto',
  'sick',
  'shift differential',
  'tips',
  'retro',
  'match',
  'employer contribution',
] as const;

export const W2_BOX_LABELS: ReadonlyArray<[W2BoxField, RegExp]> = [
  ['wagesTipsCompensation', /wages,?\s+tips,?\s+(?:and\s+)?other\s+comp(?:ensation)?/gi],
  ['federalIncomeTaxWithheld', /federal\s+income\s+tax\s+withheld/gi],
  ['socialSecurityWages', /social\s+security\s+wages/gi],
  ['socialSecurityTaxWithheld', /social\s+security\s+tax\s+withheld/gi],
  ['medicareWagesTips', /medicare\s+wages\s+and\s+tips/gi],
  ['medicareTaxWithheld', /medicare\s+tax\s+withheld/gi],
];

export const BOX_12_CODES = [
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'J', 'K', 'L', 'M', 'N', 'P', 'Q', 'R', 'S', 'T',
  'V', 'W', 'Y', 'Z', 'AA', 'BB', 'DD', 'EE', 'FF', 'GG', 'HH', 'II',
] as const;
