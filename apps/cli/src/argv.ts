import { usageError } from './errors.js';

export function normalizeArgv(rawArgv: string[]): string[] {
  // npm run forwards args as: node main.js -- <args>
  if (rawArgv[2] === '--') {
    return [rawArgv[0], rawArgv[1], ...rawArgv.slice(3)];
  }
  return rawArgv;
}

/** Undefined stays undefined so engine defaults apply */
export function parsePositiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw usageError(`Invalid ${flag}: expected a positive integer, got "${raw}".`);
  }
  return value;
}

export function parsePort(raw: string | undefined): number | undefined {
  const port = parsePositiveInt('--port', raw);
  if (port !== undefined && port > 65535) {
    throw usageError(`Invalid --port: ${port} is out of range.`);
  }
  return port;
}
