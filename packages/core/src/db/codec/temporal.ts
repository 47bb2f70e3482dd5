/**
 * Date/time text shared by both codecs. Values stay as text; only the
 * separator and the offset spelling change.
 */

const DATE = /^\d{4,}-\d{2}-\d{2}$/;
const TIME = /^\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;
const TIME_WITH_OFFSET = /^(\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}(?::?\d{2}){0,2})$/;
const DATE_TIME = /^(\d{4,}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}(?::?\d{2}){0,2})?$/;

const INFINITIES = new Set(['infinity', '-infinity']);

export interface ParsedDateTime {
  iso: string;
  hasTimezone: boolean;
}

export function isInfinity(text: string): boolean {
  return INFINITIES.has(text);
}

export function isIsoDate(text: string): boolean {
  return DATE.test(text);
}

export function isIsoTime(text: string): boolean {
  return TIME.test(text);
}

/** `+05` → `+05:00`, `-0330` → `-03:30`, `Z` → `+00:00` */
export function normalizeOffset(offset: string): string {
  if (offset === 'Z') return '+00:00';
  const sign = offset.charAt(0);
  const digits = offset.slice(1).replace(/:/g, '');
  const parts = [digits.slice(0, 2), digits.slice(2, 4) || '00'];
  if (digits.length > 4) parts.push(digits.slice(4, 6));
  return `${sign}${parts.join(':')}`;
}

/** `2024-01-15 10:30:00+00` → `2024-01-15T10:30:00+00:00` */
export function parseDateTime(text: string): ParsedDateTime | null {
  const match = DATE_TIME.exec(text);
  if (!match) return null;
  const [, date, time, offset] = match;
  if (offset === undefined) {
    return { iso: `${date}T${time}`, hasTimezone: false };
  }
  return { iso: `${date}T${time}${normalizeOffset(offset)}`, hasTimezone: true };
}

export function parseTimeWithOffset(text: string): string | null {
  const match = TIME_WITH_OFFSET.exec(text);
  if (!match) return null;
  const [, time, offset] = match;
  return `${time}${normalizeOffset(offset)}`;
}
