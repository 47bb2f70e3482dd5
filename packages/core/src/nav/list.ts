/**
 * Keys, labels and filtering for list views.
 * Selection is a position in the filtered list; keys survive a refresh.
 */

import { renderValue, valueKey } from '../db/value.js';
import type { ColumnDescriptor, Row } from '../db/types.js';
import type { ListViewState, ViewState } from './types.js';

export interface ListEntry {
  key: string;
  label: string;
}

export function isListView(view: ViewState): view is ListViewState {
  return view.kind !== 'query_editor';
}

export function rowKey(row: Row, keyColumns: number[]): string {
  return keyColumns.map((index) => (index < row.length ? valueKey(row[index]) : '')).join('\u0000');
}

/**
 * Result column indexes of the table's primary key. Falls back to the
 * first column when the key is unknown or not part of the result.
 */
export function keyColumnsFor(tableColumns: ColumnDescriptor[], resultColumns: ColumnDescriptor[]): number[] {
  const keyNames = tableColumns.filter((column) => column.isPrimaryKey).map((column) => column.name);
  const indexes = keyNames.map((name) => resultColumns.findIndex((column) => column.name === name));
  if (indexes.length > 0 && indexes.every((index) => index >= 0)) return indexes;
  return resultColumns.length > 0 ? [0] : [];
}

export function listEntries(view: ListViewState): ListEntry[] {
  switch (view.kind) {
    case 'connection_list':
      return view.items.map((profile) => ({ key: profile.id, label: profile.name }));
    case 'database_list':
      return view.items.map((database) => ({ key: database.name, label: database.name }));
    case 'schema_list':
      return view.items.map((schema) => ({ key: schema.name, label: schema.name }));
    case 'table_list':
      return view.items.map((table) => ({ key: table.name, label: table.name }));
    case 'column_list':
      return view.items.map((column) => ({ key: column.name, label: column.name }));
    case 'row_browser':
    case 'result_view':
      return view.items.map((row) => ({
        key: rowKey(row, view.keyColumns),
        label: row.map(renderValue).join(' '),
      }));
  }
}

/** Indexes into items that pass the filter, in list order */
export function visibleIndexes(view: ListViewState): number[] {
  const needle = view.filter.trim().toLowerCase();
  return listEntries(view).flatMap((entry, index) =>
    needle.length === 0 || entry.label.toLowerCase().includes(needle) ? [index] : [],
  );
}

/** Index into items of the selected entry, or null when nothing is visible */
export function selectedItemIndex(view: ListViewState): number | null {
  const visible = visibleIndexes(view);
  if (visible.length === 0) return null;
  return visible[Math.min(Math.max(view.selected, 0), visible.length - 1)];
}

export function selectedKey(view: ListViewState): string | null {
  const index = selectedItemIndex(view);
  return index === null ? null : listEntries(view)[index].key;
}

/** Visible position of the entry with this key; the first position when it is gone */
export function positionOfKey(view: ListViewState, key: string | null): number {
  if (key === null) return 0;
  const entries = listEntries(view);
  const position = visibleIndexes(view).findIndex((index) => entries[index].key === key);
  return position < 0 ? 0 : position;
}
