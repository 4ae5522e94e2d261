import { z } from 'zod';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export const isoDate = z
  .string()
  .trim()
  .regex(ISO_DATE, 'Expected a date in YYYY-MM-DD format')
  .refine(isCalendarDate, 'Not a valid calendar date');

export const npi = z
  .string()
  .trim()
  .regex(/^\d{10}$/, 'NPI must be exactly 10 digits');

export const requiredText = z.string().trim().min(1, 'Required');

export const optionalText = z.string().trim().min(1).optional();

/** Parse "$1,234.50" style portal amounts. Null when the text is not a number. */
export function parseAmount(text: string | null | undefined): number | null {
  if (text === null || text === undefined) return null;
  const cleaned = text.replace(/[$,\s]/g, '');
  if (cleaned === '' || !/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

/** Portal text with "N/A"-style placeholders turned into null. */
export function cleanText(text: string | null | undefined): string | null {
  if (text === null || text === undefined) return null;
  const trimmed = text.trim();
  if (trimmed === '' || /^(n\/?a|none|-+)$/i.test(trimmed)) return null;
  return trimmed;
}

export function keyPart(value: string | undefined): string {
  return (value ?? '').trim().toLowerCase();
}
