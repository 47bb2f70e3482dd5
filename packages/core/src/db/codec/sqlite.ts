/**
 * SQLite cells carry their own storage class; the declared column type only
 * hints at what the text or number means.
 */

import { NULL, bytesValue, unparsed, type Value } from '../value.js';
import { isIsoDate, isIsoTime, parseDateTime } from './temporal.js';

type TypeHint = 'bool' | 'decimal' | 'json' | 'uuid' | 'timestamp' | 'date' | 'time' | 'none';

const DECIMAL_TEXT = /^[-+]?\d+(?:\.\d+)?$/;
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function sqliteTypeHint(declaredType: string | null): TypeHint {
  const declared = (declaredType ?? '').toUpperCase();
  if (declared.includes('BOOL')) return 'bool';
  if (declared.includes('DECIMAL') || declared.includes('NUMERIC') || declared.includes('MONEY')) return 'decimal';
  if (declared.includes('JSON')) return 'json';
  if (declared.includes('UUID')) return 'uuid';
  if (declared.includes('TIMESTAMP') || declared.includes('DATETIME')) return 'timestamp';
  if (declared.startsWith('DATE')) return 'date';
  if (declared.startsWith('TIME')) return 'time';
  return 'none';
}

export function decodeSqlite(declaredType: string | null, cell: unknown): Value {
  if (cell === null || cell === undefined) return NULL;
  const hint = sqliteTypeHint(declaredType);

  if (typeof cell === 'bigint') {
    if (hint === 'bool' && (cell === 0n || cell === 1n)) return { kind: 'bool', value: cell === 1n };
    if (hint === 'decimal') return { kind: 'decimal', digits: cell.toString() };
    return { kind: 'int64', value: cell };
  }

  if (typeof cell === 'number') {
    if (hint === 'decimal' && Number.isFinite(cell)) return { kind: 'decimal', digits: String(cell) };
    return { kind: 'float64', value: cell };
  }

  if (typeof cell === 'string') return decodeText(hint, cell);

  if (cell instanceof Uint8Array) return bytesValue(Uint8Array.from(cell));

  return unparsed(String(cell), declaredType ?? '');
}

function decodeText(hint: TypeHint, text: string): Value {
  switch (hint) {
    case 'json':
      return { kind: 'json', raw: text };
    case 'uuid':
      if (UUID.test(text)) return { kind: 'uuid', value: text.toLowerCase() };
      break;
    case 'date':
      if (isIsoDate(text)) return { kind: 'date', iso: text };
      break;
    case 'time':
      if (isIsoTime(text)) return { kind: 'time', iso: text, hasTimezone: false };
      break;
    case 'timestamp': {
      const parsed = parseDateTime(text);
      if (parsed?.hasTimezone) return { kind: 'timestamptz', iso: parsed.iso, hasTimezone: true };
      if (parsed) return { kind: 'timestamp', iso: parsed.iso, hasTimezone: false };
      break;
    }
    case 'decimal':
      if (DECIMAL_TEXT.test(text)) return { kind: 'decimal', digits: text };
      break;
    case 'bool':
    case 'none':
      break;
  }
  return { kind: 'text', value: text };
}
