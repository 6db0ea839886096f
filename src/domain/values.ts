import type { PayFrequency } from './types.js';

const AMOUNT_PATTERN = /^\(?-?\$?\s*[\d,]*\.?\d+\)?$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Reads a monetary value from a number or a printed amount ("$4,500.00").
 * Negative, parenthesized and unparsable values are absent (null), never zero.
 */
export function toAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? roundCents(value) : null;
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) return null;
  if (trimmed.startsWith('(') || trimmed.includes('-')) return null;

  const parsed = Number(trimmed.replace(/[$,\s]/g, ''));
  return Number.isFinite(parsed) ? roundCents(parsed) : null;
}

/** Positive amount or null; used where zero carries no information (gross, net, wages). */
export function toPositiveAmount(value: unknown): number | null {
  const amount = toAmount(value);
  return amount !== null && amount > 0 ? amount : null;
}

export function toText(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function toFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    return ['true', 'yes', 'y', 'x', '1'].includes(value.trim().toLowerCase());
  }
  return value === 1;
}

function expandYear(year: string): number {
  const n = Number(year);
  if (year.length === 4) return n;
  return n >= 70 ? 1900 + n : 2000 + n;
}

function formatIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/** Normalizes ISO, M/D/Y and M-D-Y shapes (two or four digit years) to YYYY-MM-DD. */
export function toIsoDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})/.exec(trimmed);
  if (iso) return formatIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const us = /^(\d{1,2})[/-](\d{1,2})[/-](\d{2}|\d{4})$/.exec(trimmed);
  if (us) return formatIsoDate(expandYear(us[3]), Number(us[1]), Number(us[2]));

  return null;
}

const FREQUENCY_ALIASES: ReadonlyArray<[RegExp, PayFrequency]> = [
  [/^bi[\s-]?weekly$|^every other week$/, 'bi-weekly'],
  [/^semi[\s-]?monthly$|^twice monthly$/, 'semi-monthly'],
  [/^weekly$/, 'weekly'],
  [/^monthly$/, 'monthly'],
  [/^quarterly$/, 'quarterly'],
  [/^annual(ly)?$|^yearly$/, 'annual'],
];

export function normalizePayFrequency(value: unknown): PayFrequency {
  const text = toText(value)?.toLowerCase();
  if (!text) return 'unknown';
  for (const [pattern, frequency] of FREQUENCY_ALIASES) {
    if (pattern.test(text)) return frequency;
  }
  return 'unknown';
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive phrase test that does not match inside longer words ("er cost" is not in "other cost"). */
export function containsPhrase(text: string, phrase: string): boolean {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(phrase)}(?![a-z0-9])`, 'i').test(text);
}

export function containsAnyPhrase(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => containsPhrase(text, phrase));
}
