/**
 * Navigation model: what the user is looking at, what they can ask for,
 * and the read-only snapshot handed to whatever renders it.
 */

import type { ErrorBanner } from '../errors.js';
import type {
  ColumnDescriptor,
  ConnectionProfile,
  DatabaseRef,
  Row,
  SchemaRef,
  TableRef,
} from '../db/types.js';

interface ListView<K extends string, T> {
  kind: K;
  items: T[];
  /** Position in the filtered list, not in items */
  selected: number;
  /** Case-insensitive substring filter; empty shows everything */
  filter: string;
}

export type ConnectionListView = ListView<'connection_list', ConnectionProfile>;

export type DatabaseListView = ListView<'database_list', DatabaseRef>;

export interface SchemaListView extends ListView<'schema_list', SchemaRef> {
  database: DatabaseRef;
}

export interface TableListView extends ListView<'table_list', TableRef> {
  schema: SchemaRef;
}

export interface ColumnListView extends ListView<'column_list', ColumnDescriptor> {
  table: TableRef;
}

export interface RowBrowserView extends ListView<'row_browser', Row> {
  table: TableRef;
  columns: ColumnDescriptor[];
  /** Indexes of the columns that identify a row: the primary key, else the first column */
  keyColumns: number[];
  truncated: boolean;
}

export interface QueryEditorView {
  kind: 'query_editor';
  text: string;
}

export interface ResultView extends ListView<'result_view', Row> {
  sql: string;
  columns: ColumnDescriptor[];
  keyColumns: number[];
  command: string;
  rowsAffected: number | null;
  truncated: boolean;
  durationMs: number;
}

export type ListViewState =
  | ConnectionListView
  | DatabaseListView
  | SchemaListView
  | TableListView
  | ColumnListView
  | RowBrowserView
  | ResultView;

export type ViewState = ListViewState | QueryEditorView;

export type ViewKind = ViewState['kind'];

export type EnterTarget =
  | { type: 'connection'; profileId: string }
  | { type: 'database'; name: string }
  | { type: 'schema'; name: string }
  | { type: 'table'; name: string }
  | { type: 'rows' }
  | { type: 'query_editor'; text?: string }
  /** Whatever is selected in the current list */
  | { type: 'selection' };

export type Intent =
  | { type: 'enter'; target: EnterTarget }
  | { type: 'back' }
  | { type: 'refresh' }
  /** Runs the given text, or the editor's text when omitted */
  | { type: 'run_query'; text?: string }
  | { type: 'cancel' }
  | { type: 'select'; index: number }
  | { type: 'filter'; query: string }
  | { type: 'edit_query'; text: string }
  | { type: 'dismiss_error' };

export interface LoadingState {
  seq: number;
  label: string;
  rowsFetched: number;
}

export interface NavSnapshot {
  view: ViewState;
  loading: LoadingState | null;
  error: ErrorBanner | null;
  /** Entries on the back-stack */
  depth: number;
  /** Profile of the open session; its environment tag is for labeling only */
  profile: ConnectionProfile | null;
}

export type NavListener = (snapshot: NavSnapshot) => void;

export interface ProfileSource {
  listProfiles(): Promise<ConnectionProfile[]>;
}
