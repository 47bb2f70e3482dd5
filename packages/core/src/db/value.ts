/**
 * Normalized cell values shared by every backend.
 */

export type Value =
  | { kind: 'null' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'int64'; value: bigint }
  /** Exact digits as the database printed them */
  | { kind: 'decimal'; digits: string }
  | { kind: 'float64'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'bytes'; data: Uint8Array; length: number }
  | { kind: 'timestamp'; iso: string; hasTimezone: false }
  | { kind: 'timestamptz'; iso: string; hasTimezone: true }
  | { kind: 'date'; iso: string }
  | { kind: 'time'; iso: string; hasTimezone: boolean }
  | { kind: 'uuid'; value: string }
  | { kind: 'json'; raw: string }
  | { kind: 'array'; elementType: string; items: Value[] }
  | { kind: 'unparsed'; raw: string; nativeType: string };

export type ValueKind = Value['kind'];

export const NULL: Value = Object.freeze({ kind: 'null' });

export function bytesValue(data: Uint8Array): Value {
  return { kind: 'bytes', data, length: data.length };
}

export function unparsed(raw: string, nativeType: string): Value {
  return { kind: 'unparsed', raw, nativeType };
}

export function isNull(value: Value): boolean {
  return value.kind === 'null';
}

/**
 * Text shown in a table cell. Decimals keep their digits, timestamps keep
 * their offset, binary shows only its size.
 */
export function renderValue(value: Value): string {
  switch (value.kind) {
    case 'null':
      return 'NULL';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int64':
      return value.value.toString();
    case 'decimal':
      return value.digits;
    case 'float64':
      return String(value.value);
    case 'text':
    case 'uuid':
      return value.value;
    case 'bytes':
      return `<${value.length} bytes>`;
    case 'timestamp':
    case 'timestamptz':
    case 'date':
    case 'time':
      return value.iso;
    case 'json':
      return value.raw;
    case 'array':
      return `[${value.items.map(renderValue).join(', ')}]`;
    case 'unparsed':
      return value.raw;
  }
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * JSON-safe form for machine-readable output.
 * bigint and decimal become strings so no digit is lost.
 */
export function valueToJson(value: Value): JsonValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
      return value.value;
    case 'int64':
      return value.value.toString();
    case 'decimal':
      return value.digits;
    case 'float64':
      return Number.isFinite(value.value) ? value.value : String(value.value);
    case 'text':
    case 'uuid':
      return value.value;
    case 'bytes':
      return { hex: Buffer.from(value.data).toString('hex'), length: value.length };
    case 'timestamp':
    case 'timestamptz':
    case 'date':
    case 'time':
      return value.iso;
    case 'json':
      return value.raw;
    case 'array':
      return value.items.map(valueToJson);
    case 'unparsed':
      return value.raw;
  }
}

/**
 * Stable identity of a value, used to find a row again after a refresh.
 * The kind prefix keeps NULL apart from the text "NULL".
 */
export function valueKey(value: Value): string {
  if (value.kind === 'bytes') {
    return `bytes:${Buffer.from(value.data).toString('hex')}`;
  }
  return `${value.kind}:${renderValue(value)}`;
}
