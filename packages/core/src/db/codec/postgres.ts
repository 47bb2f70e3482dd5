/**
 * Postgres text-format decoder. Every column arrives as the server printed
 * it; the column's type OID picks the rule from pg-types.json.
 */

import { readFileSync } from 'node:fs';
import { NULL, bytesValue, unparsed, type Value } from '../value.js';
import { parsePgArray, type PgArrayElement } from './pg-array.js';
import { isInfinity, isIsoDate, isIsoTime, parseDateTime, parseTimeWithOffset } from './temporal.js';

const DECODE_RULES = [
  'bool',
  'int',
  'float',
  'decimal',
  'text',
  'bytes',
  'date',
  'time',
  'timetz',
  'timestamp',
  'timestamptz',
  'uuid',
  'json',
  'array',
] as const;

export type DecodeRule = (typeof DECODE_RULES)[number];

export interface PgTypeEntry {
  oid: number;
  name: string;
  rule: DecodeRule;
  /** Element OID, for array types */
  element?: number;
}

const INTEGER = /^[-+]?\d+$/;
const DECIMAL = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const FLOAT = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const NON_FINITE = new Set(['NaN', 'Infinity', '-Infinity']);

function isDecodeRule(value: unknown): value is DecodeRule {
  return DECODE_RULES.some((rule) => rule === value);
}

function loadRegistry(): Map<number, PgTypeEntry> {
  const text = readFileSync(new URL('./pg-types.json', import.meta.url), 'utf-8');
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('pg-types.json must contain an object keyed by OID');
  }

  const registry = new Map<number, PgTypeEntry>();
  for (const [key, entry] of Object.entries(parsed)) {
    const oid = Number(key);
    if (!Number.isInteger(oid) || typeof entry !== 'object' || entry === null) {
      throw new Error(`pg-types.json: bad entry for "${key}"`);
    }
    const name: unknown = entry.name;
    const rule: unknown = entry.rule;
    const element: unknown = entry.element;
    if (typeof name !== 'string' || !isDecodeRule(rule)) {
      throw new Error(`pg-types.json: bad entry for "${key}"`);
    }
    if (rule === 'array' && typeof element !== 'number') {
      throw new Error(`pg-types.json: array type "${name}" needs an element OID`);
    }
    registry.set(oid, typeof element === 'number' ? { oid, name, rule, element } : { oid, name, rule });
  }
  return registry;
}

const REGISTRY = loadRegistry();

/** OIDs the codec understands; the adapter asks the driver for raw text on each */
export function knownPgOids(): number[] {
  return [...REGISTRY.keys()];
}

export function pgTypeName(oid: number): string {
  return REGISTRY.get(oid)?.name ?? `oid:${oid}`;
}

/**
 * Decode one cell. Never throws: text a rule cannot read becomes an
 * `unparsed` value carrying the type name.
 */
export function decodePg(oid: number, raw: string | null): Value {
  if (raw === null) return NULL;
  const entry = REGISTRY.get(oid);
  if (!entry) return unparsed(raw, `oid:${oid}`);
  try {
    return decodeEntry(entry, raw) ?? unparsed(raw, entry.name);
  } catch {
    return unparsed(raw, entry.name);
  }
}

function decodeEntry(entry: PgTypeEntry, raw: string): Value | null {
  switch (entry.rule) {
    case 'bool':
      if (raw === 't') return { kind: 'bool', value: true };
      if (raw === 'f') return { kind: 'bool', value: false };
      return null;
    case 'int':
      return INTEGER.test(raw) ? { kind: 'int64', value: BigInt(raw) } : null;
    case 'float':
      return FLOAT.test(raw) || NON_FINITE.has(raw) ? { kind: 'float64', value: Number(raw) } : null;
    case 'decimal':
      return DECIMAL.test(raw) || NON_FINITE.has(raw) ? { kind: 'decimal', digits: raw } : null;
    case 'text':
      return { kind: 'text', value: raw };
    case 'bytes': {
      const data = decodeBytea(raw);
      return data ? bytesValue(data) : null;
    }
    case 'date':
      return isIsoDate(raw) || isInfinity(raw) ? { kind: 'date', iso: raw } : null;
    case 'time':
      return isIsoTime(raw) ? { kind: 'time', iso: raw, hasTimezone: false } : null;
    case 'timetz': {
      const iso = parseTimeWithOffset(raw);
      return iso ? { kind: 'time', iso, hasTimezone: true } : null;
    }
    case 'timestamp': {
      if (isInfinity(raw)) return { kind: 'timestamp', iso: raw, hasTimezone: false };
      const parsed = parseDateTime(raw);
      return parsed && !parsed.hasTimezone ? { kind: 'timestamp', iso: parsed.iso, hasTimezone: false } : null;
    }
    case 'timestamptz': {
      if (isInfinity(raw)) return { kind: 'timestamptz', iso: raw, hasTimezone: true };
      const parsed = parseDateTime(raw);
      return parsed && parsed.hasTimezone ? { kind: 'timestamptz', iso: parsed.iso, hasTimezone: true } : null;
    }
    case 'uuid':
      return UUID.test(raw) ? { kind: 'uuid', value: raw.toLowerCase() } : null;
    case 'json':
      return { kind: 'json', raw };
    case 'array':
      return decodeArray(entry, raw);
  }
}

function decodeArray(entry: PgTypeEntry, raw: string): Value | null {
  const element = entry.element === undefined ? undefined : REGISTRY.get(entry.element);
  if (!element) return null;
  return toArrayValue(element, parsePgArray(raw));
}

function toArrayValue(element: PgTypeEntry, items: PgArrayElement[]): Value {
  return {
    kind: 'array',
    elementType: element.name,
    items: items.map((item): Value => {
      if (item === null) return NULL;
      if (Array.isArray(item)) return toArrayValue(element, item);
      return decodeEntry(element, item) ?? unparsed(item, element.name);
    }),
  };
}

/**
 * bytea in either output format: hex (`\x0a0b`) or the legacy escape
 * format (`ab\000\\`).
 */
export function decodeBytea(raw: string): Uint8Array | null {
  if (raw.startsWith('\\x')) {
    const hex = raw.slice(2);
    if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) return null;
    return Uint8Array.from(Buffer.from(hex, 'hex'));
  }

  const bytes: number[] = [];
  for (let i = 0; i < raw.length; ) {
    const ch = raw.charAt(i);
    if (ch !== '\\') {
      const code = raw.charCodeAt(i);
      if (code > 0xff) return null;
      bytes.push(code);
      i++;
      continue;
    }
    if (raw.charAt(i + 1) === '\\') {
      bytes.push(0x5c);
      i += 2;
      continue;
    }
    const octal = raw.slice(i + 1, i + 4);
    if (!/^[0-3][0-7]{2}$/.test(octal)) return null;
    bytes.push(parseInt(octal, 8));
    i += 4;
  }
  return Uint8Array.from(bytes);
}
