/**
 * Engine defaults. Callers override them per navigator or executor.
 */

export interface EngineSettings {
  /** Rows per batch pulled from a backend */
  batchSize: number;
  /** Hard cap on rows kept for one result */
  maxRows: number;
  /** Connection establishment timeout in milliseconds */
  connectTimeoutMs: number;
  /** Rows shown when browsing a table */
  previewRowLimit: number;
}

export const ENGINE_DEFAULTS: Readonly<EngineSettings> = {
  batchSize: 500,
  maxRows: 5000,
  connectTimeoutMs: 10_000,
  previewRowLimit: 100,
};

export function resolveSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  const merged = { ...ENGINE_DEFAULTS, ...overrides };
  for (const [key, value] of Object.entries(merged)) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new RangeError(`Engine setting "${key}" must be a positive integer, got ${value}.`);
    }
  }
  return merged;
}
