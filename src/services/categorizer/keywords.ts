/** Phrases that mark an earnings line as paid by the employer rather than to the employee. */
export const EMPLOYER_CONTRIBUTION_KEYWORDS = [
  '401k match',
  '401k matching',
  '401(k) match',
  'employer match',
  'company match',
  'employer contribution',
  'company contribution',
  'employer benefit',
  'employer paid',
  'company paid',
  'employer 401k',
  'company 401k',
  'pension contribution',
  'employer pension',
  'retirement match',
  'employer retirement',
  'company retirement',
  'employer hsa',
  'company hsa',
  'employer fsa',
  'company fsa',
  'er cost',
  'er cost of',
  'employer cost',
  'company cost',
] as const;

export const PRE_TAX_KEYWORDS = [
  '401k',
  '401(k)',
  '403b',
  '403(b)',
  '457',
  'hsa',
  'fsa',
  'section 125',
  'sec 125',
  'pre-tax',
  'pretax',
  'health',
  'medical',
  'dental',
  'vision',
  'dependent care',
  'commuter',
] as const;
