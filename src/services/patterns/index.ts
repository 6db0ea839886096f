import {
  containsAnyPhrase,
  escapeRegExp,
  normalizePayFrequency,
  roundCents,
  toIsoDate,
} from '../../domain/values.js';
import type { DocumentKind } from '../../domain/types.js';
import { EMPLOYER_CONTRIBUTION_KEYWORDS } from '../categorizer/keywords.js';
import {
  BOX_12_CODES,
  DEDUCTION_KEYWORDS,
  EARNINGS_KEYWORDS,
  GROSS_PAY_LABELS,
  LEGAL_SUFFIXES,
  NAME_FALSE_POSITIVES,
  NET_PAY_LABELS,
  PERSON_NAME_STOPWORDS,
  TAX_KEYWORDS,
  W2_BOX_LABELS,
} from './vocabulary.js';
import type {
  DetectedBenefitCode,
  DetectedLine,
  HeuristicFields,
  LineCategory,
  W2BoxField,
} from './types.js';

export type {
  DetectedBenefitCode,
  DetectedLine,
  HeuristicFields,
  LineCategory,
  W2BoxField,
} from './types.js';

export const MAX_DETECTED_AMOUNTS = 20;
export const MAX_DETECTED_DATES = 10;

interface AmountToken {
  value: number;
  start: number;
  end: number;
  negative: boolean;
  /** Printed like money: a currency sign, thousands separators or two decimals. */
  money: boolean;
}

// Digits glued to a slash, dash, dot or word are part of a date or identifier.
const AMOUNT_TOKEN =
  /(?<![\w/.,$-])([-(])?(\$\s?)?(\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?|\d+(?:\.\d{1,2})?)(?![\w/(]|[.,]\d|-\d)/g;

const DATE_PATTERNS = [
  /(?<![\d/])\d{1,2}\/\d{1,2}\/(?:\d{4}|\d{2})(?![\d/])/g,
  /(?<![\d-])\d{4}-\d{2}-\d{2}(?![\d-])/g,
  /(?<![\d-])\d{1,2}-\d{1,2}-(?:\d{4}|\d{2})(?![\d-])/g,
];

const DATE_TOKEN = String.raw`\d{4}-\d{2}-\d{2}|\d{1,2}[/-]\d{1,2}[/-](?:\d{4}|\d{2})`;

const SSN_PATTERNS = [
  /(?<![\d-])\d{3}-\d{2}-\d{4}(?![\d-])/,
  /(?:X{3}|\*{3})-(?:X{2}|\*{2})-\d{4}(?!\d)/i,
  /\*{3,5}\d{4}(?!\d)/,
  /(?<![\d-])\d{9}(?![\d-])/,
];

const EIN_PATTERN = /(?<![\d-])\d{2}-\d{7}(?![\d-])/;

const EMPLOYEE_ID_PATTERN =
  /\b(?:employee\s+(?:id|number|no\.?|#)|emp(?:loyee)?\s*#|emp\s+id)\s*[:#]?\s*([A-Z0-9][A-Z0-9-]*)/i;

const PAY_FREQUENCY_PATTERN =
  /(?<![a-z])(bi[\s-]?weekly|semi[\s-]?monthly|weekly|monthly|quarterly|annual(?:ly)?)(?![a-z])/i;

const SUFFIX_ALTERNATION = LEGAL_SUFFIXES.flatMap((suffix) => [suffix, suffix.toUpperCase()]).join('|');

const SUFFIXED_NAME = new RegExp(
  String.raw`([A-Z][\w&'.-]*(?:[ \t]+(?:[A-Z&][\w&'.-]*|of|and|the))*,?[ \t]+(?:${SUFFIX_ALTERNATION})\.?)(?![\w-])`,
);

const LEADING_PHRASE = /^[A-Z][A-Za-z&,.' -]{2,60}$/;

const PERSON_LABEL = /(?:employee(?:'s)?\s+name|employee|name)\s*:\s*/gi;
const PERSON_AT_START = /^[A-Z][A-Za-z'-]+(?:[ \t]+[A-Z]\.?)?(?:[ \t]+[A-Z][A-Za-z'-]+){1,2}/;
const PERSON_PHRASE = /(?<![A-Za-z])[A-Z][a-z'-]+(?:[ \t]+[A-Z]\.?)?(?:[ \t]+[A-Z][a-z'-]+){1,2}(?![A-Za-z])/g;

const TAX_YEAR_PATTERNS = [
  /\btax\s+year\s*:?\s*((?:19|20)\d{2})\b/i,
  /\b((?:19|20)\d{2})\s+(?:form\s+)?W-?2\b/i,
  /\bW-?2\b[^\n]{0,40}?\b((?:19|20)\d{2})\b/i,
];

const PAY_DATE_PATTERN = new RegExp(
  String.raw`\b(?:pay|check|payment|issue|deposit|advice)\s+date\s*:?\s*(${DATE_TOKEN})`,
  'i',
);
const PERIOD_RANGE_PATTERN = new RegExp(
  String.raw`\bperiod(?:\s+dates?)?\s*:?\s*(${DATE_TOKEN})\s*(?:-|–|to|through|thru)\s*(${DATE_TOKEN})`,
  'i',
);
const PERIOD_START_PATTERN = new RegExp(
  String.raw`\bperiod\s+(?:start|begin(?:ning)?)(?:\s+date)?\s*:?\s*(${DATE_TOKEN})`,
  'i',
);
const PERIOD_END_PATTERN = new RegExp(
  String.raw`\bperiod\s+end(?:ing)?(?:\s+date)?\s*:?\s*(${DATE_TOKEN})`,
  'i',
);

const BOX_12_ENTRY = /\b(?:12[a-d]|code)\b\s*[:-]?\s*([A-Za-z]{1,2})\s+\$?(\d[\d,]*(?:\.\d{1,2})?)(?!\d)/gi;

const BOX_12_CODE_SET: ReadonlySet<string> = new Set(BOX_12_CODES);

function phrasePattern(phrase: string): RegExp {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(phrase)}(?![a-z0-9])`, 'gi');
}

type PayLabel = 'gross' | 'net';

const PAY_LABEL_PATTERNS: ReadonlyArray<[PayLabel, RegExp]> = [
  ...GROSS_PAY_LABELS.map((label): [PayLabel, RegExp] => ['gross', phrasePattern(label)]),
  ...NET_PAY_LABELS.map((label): [PayLabel, RegExp] => ['net', phrasePattern(label)]),
];

function findAmounts(text: string): AmountToken[] {
  const tokens: AmountToken[] = [];
  for (const match of text.matchAll(AMOUNT_TOKEN)) {
    const digits = match[3];
    if (digits === undefined) continue;
    const start = match.index ?? 0;
    tokens.push({
      value: roundCents(Number(digits.replace(/,/g, ''))),
      start,
      end: start + match[0].length,
      negative: match[1] !== undefined,
      money: match[2] !== undefined || digits.includes(',') || /\.\d{2}$/.test(digits),
    });
  }
  return tokens;
}

function positiveAmounts(text: string): AmountToken[] {
  return findAmounts(text).filter((token) => !token.negative && token.value > 0);
}

export function detectAmounts(text: string): number[] {
  return positiveAmounts(text)
    .map((token) => token.value)
    .slice(0, MAX_DETECTED_AMOUNTS);
}

export function detectDates(text: string): string[] {
  return DATE_PATTERNS.flatMap((pattern) => Array.from(text.matchAll(pattern), (match) => match[0])).slice(
    0,
    MAX_DETECTED_DATES,
  );
}

function firstCapture(text: string, patterns: readonly RegExp[]): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) return match[1] ?? match[0];
  }
  return undefined;
}

function isNameFalsePositive(candidate: string): boolean {
  return containsAnyPhrase(candidate, NAME_FALSE_POSITIVES);
}

function detectCompanyName(lines: string[]): string | undefined {
  for (const line of lines) {
    const match = SUFFIXED_NAME.exec(line);
    const candidate = match?.[1]?.trim();
    if (candidate && !isNameFalsePositive(candidate)) return candidate;
  }

  const firstLine = lines.find((line) => line.trim().length > 0)?.trim();
  if (firstLine && LEADING_PHRASE.test(firstLine) && !isNameFalsePositive(firstLine)) {
    return firstLine;
  }
  return undefined;
}

function isPlausiblePerson(candidate: string, companyName: string | undefined): boolean {
  if (containsAnyPhrase(candidate, PERSON_NAME_STOPWORDS)) return false;
  if (containsAnyPhrase(candidate, LEGAL_SUFFIXES)) return false;
  if (companyName && (companyName.includes(candidate) || candidate.includes(companyName))) return false;
  return true;
}

function detectEmployeeName(text: string, lines: string[], companyName: string | undefined): string | undefined {
  for (const label of text.matchAll(PERSON_LABEL)) {
    const rest = text.slice((label.index ?? 0) + label[0].length);
    const candidate = PERSON_AT_START.exec(rest)?.[0];
    if (candidate && isPlausiblePerson(candidate, companyName)) return candidate;
  }

  for (const line of lines) {
    for (const match of line.matchAll(PERSON_PHRASE)) {
      if (isPlausiblePerson(match[0], companyName)) return match[0];
    }
  }
  return undefined;
}

interface LabelHit<F extends string> {
  field: F;
  start: number;
  end: number;
}

function findLabelHits<F extends string>(line: string, patterns: ReadonlyArray<[F, RegExp]>): LabelHit<F>[] {
  const hits: LabelHit<F>[] = [];
  for (const [field, pattern] of patterns) {
    for (const match of line.matchAll(pattern)) {
      const start = match.index ?? 0;
      hits.push({ field, start, end: start + match[0].length });
    }
  }
  hits.sort((a, b) => a.start - b.start || b.end - a.end);

  // Overlapping labels ("take home pay" and "take home") keep the longest.
  const kept: LabelHit<F>[] = [];
  for (const hit of hits) {
    const previous = kept[kept.length - 1];
    if (!previous || hit.start >= previous.end) kept.push(hit);
  }
  return kept;
}

/**
 * Reads the amounts printed after each label on the same line, up to the next
 * label. When a row of labels carries no amounts, the following line is read as
 * their values in order.
 */
function scanLabeledAmounts<F extends string>(
  lines: string[],
  patterns: ReadonlyArray<[F, RegExp]>,
  accept: (token: AmountToken) => boolean,
): Map<F, number[]> {
  const found = new Map<F, number[]>();

  lines.forEach((line, index) => {
    const hits = findLabelHits(line, patterns);
    if (hits.length === 0) return;

    let anyInline = false;
    hits.forEach((hit, hitIndex) => {
      const segmentEnd = hits[hitIndex + 1]?.start ?? line.length;
      const amounts = positiveAmounts(line.slice(hit.end, segmentEnd)).filter(accept);
      if (amounts.length === 0) return;
      anyInline = true;
      if (!found.has(hit.field)) found.set(hit.field, amounts.map((token) => token.value));
    });

    const nextLine = lines[index + 1];
    if (anyInline || nextLine === undefined) return;

    const below = positiveAmounts(nextLine).filter(accept);
    if (below.length < hits.length) return;
    hits.forEach((hit, hitIndex) => {
      const token = below[hitIndex];
      if (token && !found.has(hit.field)) found.set(hit.field, [token.value]);
    });
  });

  return found;
}

function classifyLine(description: string): LineCategory | null {
  if (containsAnyPhrase(description, EMPLOYER_CONTRIBUTION_KEYWORDS)) return 'earnings';
  if (containsAnyPhrase(description, TAX_KEYWORDS)) return 'tax';
  if (containsAnyPhrase(description, DEDUCTION_KEYWORDS)) return 'deduction';
  if (containsAnyPhrase(description, EARNINGS_KEYWORDS)) return 'earnings';
  return null;
}

function describeLine(line: string, tokens: AmountToken[]): string {
  let description = '';
  let cursor = 0;
  for (const token of tokens) {
    description += `${line.slice(cursor, token.start)} `;
    cursor = token.end;
  }
  description += line.slice(cursor);
  return description
    .replace(/\|/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^[\s:$-]+|[\s:$-]+$/g, '');
}

function assignAmounts(values: number[]): Pick<DetectedLine, 'currentAmount' | 'ytdAmount' | 'hours' | 'rate'> | null {
  const [first, second, third, fourth] = values;
  if (first === undefined) return null;
  if (second === undefined) return { currentAmount: first, ytdAmount: null, hours: null, rate: null };
  if (third === undefined) return { currentAmount: first, ytdAmount: second, hours: null, rate: null };

  // hours × rate printed before the current amount
  if (Math.abs(first * second - third) <= Math.max(1, third * 0.01)) {
    return { currentAmount: third, ytdAmount: fourth ?? null, hours: first, rate: second };
  }
  const current = values[values.length - 2] ?? first;
  const ytd = values[values.length - 1] ?? null;
  return { currentAmount: current, ytdAmount: ytd, hours: null, rate: null };
}

const TOTAL_LINE = /(?<![a-z])(?:total|totals|summary)(?![a-z])/i;

function detectLineItems(lines: string[]): DetectedLine[] {
  const items: DetectedLine[] = [];

  for (const line of lines) {
    if (findLabelHits(line, PAY_LABEL_PATTERNS).length > 0) continue;
    if (TOTAL_LINE.test(line)) continue;
    if (DATE_PATTERNS.some((pattern) => line.match(pattern) !== null)) continue;

    const tokens = findAmounts(line);
    const values = tokens.filter((token) => !token.negative && token.value > 0).map((token) => token.value);
    const amounts = assignAmounts(values);
    if (!amounts) continue;

    const description = describeLine(line, tokens);
    if (!/[A-Za-z]{2,}/.test(description) || description.length > 60) continue;

    const category = classifyLine(description);
    if (!category) continue;

    items.push({ category, description, ...amounts });
  }

  return items;
}

function detectBox12Codes(text: string): DetectedBenefitCode[] {
  const codes: DetectedBenefitCode[] = [];
  for (const match of text.matchAll(BOX_12_ENTRY)) {
    const code = match[1]?.toUpperCase();
    const amount = Number((match[2] ?? '').replace(/,/g, ''));
    if (code && BOX_12_CODE_SET.has(code) && Number.isFinite(amount) && amount > 0) {
      codes.push({ code, amount: roundCents(amount) });
    }
  }
  return codes;
}

function isoFrom(text: string, pattern: RegExp, group = 1): string | undefined {
  const match = pattern.exec(text);
  return toIsoDate(match?.[group]) ?? undefined;
}

/**
 * Recognizes amounts, dates, identifiers, pay frequency and names in a text
 * blob. Pure and total: fields that do not match are left out. Paystub-only
 * fields are skipped for W-2 documents and the reverse; with no kind given,
 * everything is attempted.
 */
export function matchFields(text: string, kind?: DocumentKind): HeuristicFields {
  const lines = text.split(/\r?\n/);
  const fields: HeuristicFields = {
    detectedAmounts: detectAmounts(text),
    detectedDates: detectDates(text),
  };

  const ssn = firstCapture(text, SSN_PATTERNS);
  if (ssn) fields.employeeSsn = ssn;

  const employeeId = EMPLOYEE_ID_PATTERN.exec(text)?.[1];
  if (employeeId && /\d/.test(employeeId)) fields.employeeId = employeeId;

  const frequency = PAY_FREQUENCY_PATTERN.exec(text)?.[1];
  if (frequency) fields.payFrequency = normalizePayFrequency(frequency);

  const companyName = detectCompanyName(lines);
  if (companyName) fields.companyName = companyName;

  const employeeName = detectEmployeeName(text, lines, companyName);
  if (employeeName) fields.employeeName = employeeName;

  if (kind !== 'w2') {
    const payDate = isoFrom(text, PAY_DATE_PATTERN);
    if (payDate) fields.payDate = payDate;
    const periodStart = isoFrom(text, PERIOD_RANGE_PATTERN) ?? isoFrom(text, PERIOD_START_PATTERN);
    if (periodStart) fields.periodStart = periodStart;
    const periodEnd = isoFrom(text, PERIOD_RANGE_PATTERN, 2) ?? isoFrom(text, PERIOD_END_PATTERN);
    if (periodEnd) fields.periodEnd = periodEnd;

    const labeled = scanLabeledAmounts(lines, PAY_LABEL_PATTERNS, () => true);
    const [grossCurrent, grossYtd] = labeled.get('gross') ?? [];
    const [netCurrent, netYtd] = labeled.get('net') ?? [];
    if (grossCurrent !== undefined) fields.grossPayCurrent = grossCurrent;
    if (grossYtd !== undefined) fields.grossPayYtd = grossYtd;
    if (netCurrent !== undefined) fields.netPayCurrent = netCurrent;
    if (netYtd !== undefined) fields.netPayYtd = netYtd;

    const lineItems = detectLineItems(lines);
    if (lineItems.length > 0) fields.lineItems = lineItems;
  }

  if (kind !== 'paystub') {
    const ein = EIN_PATTERN.exec(text)?.[0];
    if (ein) fields.employerEin = ein;

    const taxYear = firstCapture(text, TAX_YEAR_PATTERNS);
    if (taxYear) fields.taxYear = taxYear;

    const boxes = scanLabeledAmounts(lines, W2_BOX_LABELS, (token) => token.money);
    if (boxes.size > 0) {
      const w2Boxes: Partial<Record<W2BoxField, number>> = {};
      for (const [field, values] of boxes) {
        const value = values[0];
        if (value !== undefined) w2Boxes[field] = value;
      }
      fields.w2Boxes = w2Boxes;
    }

    const box12Codes = detectBox12Codes(text);
    if (box12Codes.length > 0) fields.box12Codes = box12Codes;
  }

  return fields;
}

/**
 * Combines two field maps. Scalar fields already set in `base` win; detected
 * amounts and dates concatenate up to their caps; list fields concatenate.
 */
export function mergeHeuristicFields(base: HeuristicFields, next: HeuristicFields): HeuristicFields {
  const merged: HeuristicFields = {
    ...next,
    ...base,
    detectedAmounts: [...base.detectedAmounts, ...next.detectedAmounts].slice(0, MAX_DETECTED_AMOUNTS),
    detectedDates: [...base.detectedDates, ...next.detectedDates].slice(0, MAX_DETECTED_DATES),
  };

  const lineItems = [...(base.lineItems ?? []), ...(next.lineItems ?? [])];
  if (lineItems.length > 0) merged.lineItems = lineItems;

  const box12Codes = [...(base.box12Codes ?? []), ...(next.box12Codes ?? [])];
  if (box12Codes.length > 0) merged.box12Codes = box12Codes;

  if (base.w2Boxes || next.w2Boxes) merged.w2Boxes = { ...next.w2Boxes, ...base.w2Boxes };

  return merged;
}

export function emptyHeuristicFields(): HeuristicFields {
  return { detectedAmounts: [], detectedDates: [] };
}
