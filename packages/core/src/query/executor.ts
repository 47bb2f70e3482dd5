/**
 * Runs ad hoc SQL on an open session.
 * Rows are staged batch by batch and handed back only when the statement
 * completes, so a cancelled or failed run never leaves partial rows behind.
 */

import { ENGINE_DEFAULTS, type EngineSettings } from '../db/defaults.js';
import { isBlankSql } from '../db/sql-check.js';
import type { ColumnDescriptor, QueryResult, Row, Session } from '../db/types.js';
import { QueryError, cancelledError, errorMessage, isCancelled, queryError } from '../errors.js';

export interface RunOptions {
  signal?: AbortSignal;
  batchSize?: number;
  maxRows?: number;
  /** Database of the server to run against, when not the profile's own */
  database?: string;
  onProgress?: (rowsFetched: number) => void;
}

export type ExecutorSettings = Pick<EngineSettings, 'batchSize' | 'maxRows'>;

function toQueryError(err: unknown): QueryError {
  return err instanceof QueryError ? err : queryError('runtime', errorMessage(err));
}

/** Settles with the promise, or rejects with a cancelled error as soon as the signal fires. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancelledError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export class QueryExecutor {
  private readonly settings: ExecutorSettings;

  constructor(settings: Partial<ExecutorSettings> = {}) {
    this.settings = {
      batchSize: settings.batchSize ?? ENGINE_DEFAULTS.batchSize,
      maxRows: settings.maxRows ?? ENGINE_DEFAULTS.maxRows,
    };
  }

  async run(session: Session, sql: string, options: RunOptions = {}): Promise<QueryResult> {
    if (isBlankSql(sql)) {
      throw queryError('syntax', 'Query is empty.');
    }
    const { signal } = options;
    if (signal?.aborted) throw cancelledError();

    const batchSize = options.batchSize ?? this.settings.batchSize;
    const maxRows = options.maxRows ?? this.settings.maxRows;
    const started = performance.now();

    const running = session.executeQuery(sql, { batchSize, database: options.database });
    const iterator = running.events[Symbol.asyncIterator]();

    let columns: ColumnDescriptor[] = [];
    const staged: Row[] = [];
    let command = '';
    let rowsAffected: number | null = null;
    let truncated = false;

    try {
      while (!truncated) {
        const next = await raceAbort(iterator.next(), signal);
        if (next.done) break;
        const event = next.value;
        switch (event.type) {
          case 'columns':
            columns = event.columns;
            break;
          case 'rows':
            for (const row of event.rows) {
              if (row.length !== columns.length) {
                throw queryError('runtime', `Row has ${row.length} values but the result has ${columns.length} columns.`);
              }
              if (staged.length >= maxRows) {
                truncated = true;
                break;
              }
              staged.push(row);
            }
            options.onProgress?.(staged.length);
            break;
          case 'complete':
            command = event.command;
            rowsAffected = event.rowsAffected;
            break;
        }
      }
    } catch (err) {
      if (signal?.aborted || isCancelled(err)) {
        await session.cancel(running.handle);
        throw cancelledError();
      }
      throw toQueryError(err);
    } finally {
      // Closing the stream ends the statement when it stopped early.
      await iterator.return?.();
    }

    return {
      columns,
      rows: staged,
      command: command || 'SELECT',
      rowsAffected,
      truncated,
      durationMs: Math.round(performance.now() - started),
    };
  }
}
