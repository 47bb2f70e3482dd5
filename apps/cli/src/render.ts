/**
 * Text rendering for query results and navigator snapshots.
 * Pure functions of their input; printing is left to the caller.
 */

import {
  renderValue,
  selectedItemIndex,
  valueToJson,
  visibleIndexes,
  type ColumnDescriptor,
  type JsonValue,
  type ListViewState,
  type NavSnapshot,
  type QueryResult,
  type Row,
  type Value,
  type ViewState,
} from '@quarry/core';
import { formatTable } from './util/table.js';

export type ResultFormat = 'table' | 'json' | 'csv';

export const RESULT_FORMATS: readonly ResultFormat[] = ['table', 'json', 'csv'];

export function isResultFormat(value: string): value is ResultFormat {
  return RESULT_FORMATS.some((format) => format === value);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function summarizeResult(result: QueryResult): string {
  const elapsed = `${Math.round(result.durationMs)} ms`;
  if (result.columns.length === 0) {
    const affected = result.rowsAffected === null ? '' : `, ${plural(result.rowsAffected, 'row')} affected`;
    return `${result.command || 'OK'}${affected} (${elapsed})`;
  }
  const truncated = result.truncated ? ' (truncated)' : '';
  return `${plural(result.rows.length, 'row')}${truncated} in ${elapsed}`;
}

export function renderResultTable(result: QueryResult): string {
  if (result.columns.length === 0) return summarizeResult(result);
  const table = formatTable(
    result.columns.map((column) => column.name),
    result.rows.map((row) => row.map(renderValue)),
  );
  return `${table}\n${summarizeResult(result)}`;
}

export interface JsonResult {
  columns: { name: string; type: string }[];
  rows: JsonValue[][];
  rowCount: number;
  command: string;
  rowsAffected: number | null;
  truncated: boolean;
  durationMs: number;
}

export function resultToJson(result: QueryResult): JsonResult {
  return {
    columns: result.columns.map((column) => ({ name: column.name, type: column.nativeType })),
    rows: result.rows.map((row) => row.map(valueToJson)),
    rowCount: result.rows.length,
    command: result.command,
    rowsAffected: result.rowsAffected,
    truncated: result.truncated,
    durationMs: Math.round(result.durationMs),
  };
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function csvCell(value: Value): string {
  return value.kind === 'null' ? '' : escapeCsvField(renderValue(value));
}

/** NULL is an empty field; every line ends in a newline */
export function resultToCsv(result: QueryResult): string {
  const lines = [result.columns.map((column) => escapeCsvField(column.name)).join(',')];
  for (const row of result.rows) {
    lines.push(row.map(csvCell).join(','));
  }
  return lines.join('\n') + '\n';
}

// -- navigator -----------------------------------------------------------

function title(view: ViewState): string {
  switch (view.kind) {
    case 'connection_list':
      return 'Connections';
    case 'database_list':
      return 'Databases';
    case 'schema_list':
      return `Schemas in ${view.database.name}`;
    case 'table_list':
      return `Tables in ${view.schema.database}.${view.schema.name}`;
    case 'column_list':
      return `Columns of ${view.table.schema}.${view.table.name}`;
    case 'row_browser':
      return `Rows of ${view.table.schema}.${view.table.name}`;
    case 'query_editor':
      return 'Query editor';
    case 'result_view':
      return `Result of ${view.sql.replace(/\s+/g, ' ').trim()}`;
  }
}

function header(snapshot: NavSnapshot): string {
  const { profile } = snapshot;
  const where = profile ? `${profile.name} [${profile.environment}]` : 'not connected';
  return `${where} > ${title(snapshot.view)}`;
}

/** Label of one entry in a simple list */
function entryLabel(view: Exclude<ListViewState, { kind: 'column_list' | 'row_browser' | 'result_view' }>, index: number): string {
  switch (view.kind) {
    case 'connection_list': {
      const profile = view.items[index];
      return `${profile.name} (${profile.backendKind}, ${profile.environment})`;
    }
    case 'database_list':
      return view.items[index].name;
    case 'schema_list': {
      const schema = view.items[index];
      return schema.owner ? `${schema.name} (owner ${schema.owner})` : schema.name;
    }
    case 'table_list': {
      const table = view.items[index];
      const size = table.sizeLabel ? `, ${table.sizeLabel}` : '';
      return `${table.name} (${table.kind}${size})`;
    }
  }
}

function columnCells(column: ColumnDescriptor): string[] {
  return [
    column.name,
    column.nativeType,
    column.nullable ? 'yes' : 'no',
    column.defaultValue ?? '',
    column.isPrimaryKey ? 'PK' : '',
    column.description ?? '',
  ];
}

function rowCells(row: Row): string[] {
  return row.map(renderValue);
}

function markedTable(view: ListViewState, columns: string[], cells: (index: number) => string[]): string[] {
  const visible = visibleIndexes(view);
  if (visible.length === 0) return [view.items.length === 0 ? '(empty)' : '(no matches)'];
  const selected = selectedItemIndex(view);
  const rows = visible.map((index, position) => [
    `${index === selected ? '>' : ' '}${position + 1}`,
    ...cells(index),
  ]);
  return formatTable(['#', ...columns], rows).split('\n');
}

function listBody(view: ListViewState): string[] {
  switch (view.kind) {
    case 'column_list': {
      const columns = view.items;
      return markedTable(view, ['name', 'type', 'nullable', 'default', 'key', 'description'], (index) =>
        columnCells(columns[index]),
      );
    }
    case 'row_browser':
    case 'result_view': {
      if (view.columns.length === 0) return [];
      const rows = view.items;
      return markedTable(
        view,
        view.columns.map((column) => column.name),
        (index) => rowCells(rows[index]),
      );
    }
    default: {
      const list = view;
      const visible = visibleIndexes(list);
      if (visible.length === 0) return [list.items.length === 0 ? '(empty)' : '(no matches)'];
      const selected = selectedItemIndex(list);
      return visible.map(
        (index, position) => `${index === selected ? '>' : ' '} ${position + 1}. ${entryLabel(list, index)}`,
      );
    }
  }
}

function footer(view: ViewState): string | null {
  if (view.kind === 'result_view') {
    return summarizeResult({
      columns: view.columns,
      rows: view.items,
      command: view.command,
      rowsAffected: view.rowsAffected,
      truncated: view.truncated,
      durationMs: view.durationMs,
    });
  }
  if (view.kind === 'row_browser') {
    return `${plural(view.items.length, 'row')}${view.truncated ? ' (truncated)' : ''}`;
  }
  return null;
}

export function renderSnapshot(snapshot: NavSnapshot): string {
  const { view } = snapshot;
  const lines = [header(snapshot)];

  if (view.kind === 'query_editor') {
    lines.push(view.text.trim().length > 0 ? view.text : '(empty query)');
  } else {
    if (view.filter.trim().length > 0) {
      lines.push(`Filter: ${view.filter.trim()} (${visibleIndexes(view).length} of ${view.items.length})`);
    }
    lines.push(...listBody(view));
  }

  const summary = footer(view);
  if (summary) lines.push(summary);
  if (snapshot.loading) {
    const fetched = snapshot.loading.rowsFetched > 0 ? ` (${plural(snapshot.loading.rowsFetched, 'row')})` : '';
    lines.push(`... ${snapshot.loading.label}${fetched}`);
  }
  if (snapshot.error) {
    lines.push(`! ${snapshot.error.source}/${snapshot.error.code}: ${snapshot.error.message}`);
  }
  return lines.join('\n');
}
