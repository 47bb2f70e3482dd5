/**
 * Navigation state machine.
 *
 * Owns the open session, the back-stack and the catalog cache. Intents
 * come in through dispatch(); anything that needs I/O becomes a request
 * stamped with a sequence number. A new intent aborts the request in
 * flight, and a response is applied only while its number is still the
 * latest for its slot.
 */

import type { CredentialResolver } from '../credentials/resolver.js';
import type { BackendRegistry } from '../db/backend.js';
import { connectProfile } from '../db/connect.js';
import { resolveSettings, type EngineSettings } from '../db/defaults.js';
import { Lane } from '../db/lane.js';
import type { ConnectionProfile, DatabaseRef, QueryResult, Session } from '../db/types.js';
import { NavigationError, describeError, errorMessage, type ErrorBanner } from '../errors.js';
import { QueryExecutor, raceAbort } from '../query/executor.js';
import { CatalogCache } from './cache.js';
import { isListView, keyColumnsFor, positionOfKey, selectedItemIndex, selectedKey, visibleIndexes } from './list.js';
import type {
  EnterTarget,
  Intent,
  ListViewState,
  NavListener,
  NavSnapshot,
  ProfileSource,
  ResultView,
  RowBrowserView,
  ViewKind,
  ViewState,
} from './types.js';

export interface NavigatorDeps {
  profiles: ProfileSource;
  registry: BackendRegistry;
  resolver: CredentialResolver;
  executor?: QueryExecutor;
  settings?: Partial<EngineSettings>;
  onWarning?: (message: string) => void;
}

type Slot = 'session' | 'view';
type Purpose = 'profiles' | 'connect' | 'catalog' | 'preview' | 'query';

interface RequestPlan {
  slot: Slot;
  purpose: Purpose;
  label: string;
  sql?: string;
}

interface InFlight extends RequestPlan {
  seq: number;
  controller: AbortController;
  rowsFetched: number;
}

interface OpenedSession {
  profile: ConnectionProfile;
  session: Session;
  databases: DatabaseRef[];
}

interface Preview {
  /** Catalog columns of the table, for its primary key */
  tableColumns: RowBrowserView['columns'];
  result: QueryResult;
}

function isView<K extends ViewKind>(view: ViewState, kind: K): view is Extract<ViewState, { kind: K }> {
  return view.kind === kind;
}

/** Same view with fresh items; the selection follows its key when it survived. */
function refreshed<V extends ListViewState>(previous: V, next: V): V {
  return { ...next, selected: positionOfKey(next, selectedKey(previous)) };
}

/** Abort the child when the parent aborts. Returns the unlink function. */
function follow(parent: AbortSignal, child: AbortController): () => void {
  if (parent.aborted) {
    child.abort();
    return () => {};
  }
  const onAbort = (): void => child.abort();
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}

function resultView(sql: string, result: QueryResult): ResultView {
  return {
    kind: 'result_view',
    sql,
    columns: result.columns,
    keyColumns: result.columns.length > 0 ? [0] : [],
    command: result.command,
    rowsAffected: result.rowsAffected,
    truncated: result.truncated,
    durationMs: result.durationMs,
    items: result.rows,
    selected: 0,
    filter: '',
  };
}

function previewView(table: RowBrowserView['table'], preview: Preview): RowBrowserView {
  return {
    kind: 'row_browser',
    table,
    columns: preview.result.columns,
    keyColumns: keyColumnsFor(preview.tableColumns, preview.result.columns),
    truncated: preview.result.truncated,
    items: preview.result.rows,
    selected: 0,
    filter: '',
  };
}

export class NavigationStateMachine {
  private view: ViewState = { kind: 'connection_list', items: [], selected: 0, filter: '' };
  private readonly stack: ViewState[] = [];
  private error: ErrorBanner | null = null;
  private session: Session | null = null;
  private profile: ConnectionProfile | null = null;
  private scope = new AbortController();
  private inflight: InFlight | null = null;
  private seq = 0;
  private readonly latest = new Map<Slot, number>();
  private readonly cache = new CatalogCache();
  private readonly listeners = new Set<NavListener>();
  private readonly connectLane = new Lane();
  private readonly settings: EngineSettings;
  private readonly executor: QueryExecutor;
  private readonly warn: (message: string) => void;
  private lastQuery = '';

  constructor(private readonly deps: NavigatorDeps) {
    this.settings = resolveSettings(deps.settings);
    this.executor = deps.executor ?? new QueryExecutor(this.settings);
    this.warn = deps.onWarning ?? (() => {});
  }

  snapshot(): NavSnapshot {
    const inflight = this.inflight;
    return {
      view: this.view,
      loading: inflight ? { seq: inflight.seq, label: inflight.label, rowsFetched: inflight.rowsFetched } : null,
      error: this.error,
      depth: this.stack.length,
      profile: this.profile,
    };
  }

  subscribe(listener: NavListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Load the connection list. */
  start(): Promise<void> {
    return this.dispatch({ type: 'refresh' });
  }

  /** Never rejects: failures end up as the error banner. */
  async dispatch(intent: Intent): Promise<void> {
    try {
      await this.handle(intent);
    } catch (err) {
      this.error = describeError(err);
      this.emit();
    }
  }

  /** Abort whatever is running and close the session. */
  async close(): Promise<void> {
    this.abortInflight();
    const root = this.stack[0] ?? this.view;
    this.stack.length = 0;
    const closing = this.endSession();
    if (isView(root, 'connection_list')) this.view = root;
    this.emit();
    await closing;
  }

  private async handle(intent: Intent): Promise<void> {
    switch (intent.type) {
      case 'enter':
        return this.enter(intent.target);
      case 'back':
        return this.back();
      case 'refresh':
        return this.refresh();
      case 'run_query':
        return this.runQuery(intent.text);
      case 'cancel':
        return this.cancel();
      case 'select':
        return this.select(intent.index);
      case 'filter':
        return this.filter(intent.query);
      case 'edit_query': {
        const view = this.requireView('query_editor', 'Editing a query');
        this.view = { ...view, text: intent.text };
        this.emit();
        return;
      }
      case 'dismiss_error':
        this.error = null;
        this.emit();
        return;
    }
  }

  private enter(target: EnterTarget): Promise<void> {
    switch (target.type) {
      case 'connection':
        return this.connect(target.profileId);
      case 'database':
        return this.enterDatabase(target.name);
      case 'schema':
        return this.enterSchema(target.name);
      case 'table':
        return this.enterTable(target.name);
      case 'rows':
        return this.enterRows();
      case 'query_editor':
        return this.openEditor(target.text);
      case 'selection':
        return this.enterSelection();
    }
  }

  // -- connect ---------------------------------------------------------

  private connect(profileId: string): Promise<void> {
    const view = this.requireView('connection_list', 'Connecting');
    const known = view.items.find((profile) => profile.id === profileId);

    return this.request(
      { slot: 'session', purpose: 'connect', label: `Connecting to ${known?.name ?? profileId}` },
      async (signal) => this.openSession(known ?? (await this.findProfile(profileId)), signal),
      (opened) => {
        if (this.session) {
          void this.closeQuietly(this.session);
        }
        this.session = opened.session;
        this.profile = opened.profile;
        this.scope = new AbortController();
        this.cache.clear();
        this.cache.setDatabases(opened.databases);
        this.push({ kind: 'database_list', items: opened.databases, selected: 0, filter: '' });
      },
      (opened) => this.closeQuietly(opened.session),
    );
  }

  private async openSession(profile: ConnectionProfile, signal: AbortSignal): Promise<OpenedSession> {
    // One connect at a time, so the resolver never prompts twice at once.
    const session = await this.connectLane.run(() =>
      connectProfile(
        profile,
        { registry: this.deps.registry, resolver: this.deps.resolver, onWarning: this.warn },
        { timeoutMs: this.settings.connectTimeoutMs },
      ),
    );
    if (signal.aborted) {
      return { profile, session, databases: [] };
    }
    try {
      const databases = await raceAbort(session.listDatabases(), signal);
      return { profile, session, databases };
    } catch (err) {
      await this.closeQuietly(session);
      throw err;
    }
  }

  private async findProfile(profileId: string): Promise<ConnectionProfile> {
    const profiles = await this.deps.profiles.listProfiles();
    const found = profiles.find((profile) => profile.id === profileId);
    if (!found) {
      throw new NavigationError('not_found', `No connection profile with id "${profileId}".`);
    }
    return found;
  }

  // -- catalog levels ----------------------------------------------------

  private enterDatabase(name: string): Promise<void> {
    const view = this.requireView('database_list', 'Opening a database');
    const session = this.requireSession();
    const database = view.items.find((item) => item.name === name);
    if (!database) throw new NavigationError('not_found', `No database named "${name}".`);

    const cached = this.cache.getSchemas(database);
    if (cached) return this.show({ kind: 'schema_list', database, items: cached, selected: 0, filter: '' });

    return this.request(
      { slot: 'view', purpose: 'catalog', label: `Loading schemas in ${database.name}` },
      (signal) => raceAbort(session.listSchemas(database), signal),
      (schemas) => {
        this.cache.setSchemas(database, schemas);
        this.push({ kind: 'schema_list', database, items: schemas, selected: 0, filter: '' });
      },
    );
  }

  private enterSchema(name: string): Promise<void> {
    const view = this.requireView('schema_list', 'Opening a schema');
    const session = this.requireSession();
    const schema = view.items.find((item) => item.name === name);
    if (!schema) throw new NavigationError('not_found', `No schema named "${name}".`);

    const cached = this.cache.getTables(schema);
    if (cached) return this.show({ kind: 'table_list', schema, items: cached, selected: 0, filter: '' });

    return this.request(
      { slot: 'view', purpose: 'catalog', label: `Loading tables in ${schema.name}` },
      (signal) => raceAbort(session.listTables(schema), signal),
      (tables) => {
        this.cache.setTables(schema, tables);
        this.push({ kind: 'table_list', schema, items: tables, selected: 0, filter: '' });
      },
    );
  }

  private enterTable(name: string): Promise<void> {
    const view = this.requireView('table_list', 'Opening a table');
    const session = this.requireSession();
    const table = view.items.find((item) => item.name === name);
    if (!table) throw new NavigationError('not_found', `No table named "${name}".`);

    const cached = this.cache.getColumns(table);
    if (cached) return this.show({ kind: 'column_list', table, items: cached, selected: 0, filter: '' });

    return this.request(
      { slot: 'view', purpose: 'catalog', label: `Loading columns of ${table.name}` },
      (signal) => raceAbort(session.listColumns(table), signal),
      (columns) => {
        this.cache.setColumns(table, columns);
        this.push({ kind: 'column_list', table, items: columns, selected: 0, filter: '' });
      },
    );
  }

  private enterRows(): Promise<void> {
    const view = this.view;
    let table: RowBrowserView['table'];
    if (view.kind === 'column_list') {
      table = view.table;
    } else if (view.kind === 'table_list') {
      const index = selectedItemIndex(view);
      if (index === null) throw new NavigationError('invalid_intent', 'No table is selected.');
      table = view.items[index];
    } else {
      throw new NavigationError('invalid_intent', 'Rows are browsed from a table or its columns.');
    }
    return this.loadPreview(table, (next) => this.push(next));
  }

  private loadPreview(table: RowBrowserView['table'], apply: (next: RowBrowserView) => void): Promise<void> {
    const session = this.requireSession();
    return this.request(
      { slot: 'view', purpose: 'preview', label: `Loading rows of ${table.name}` },
      async (signal, progress): Promise<Preview> => {
        const tableColumns = this.cache.getColumns(table) ?? (await raceAbort(session.listColumns(table), signal));
        const result = await this.executor.run(session, session.tablePreviewSql(table, this.settings.previewRowLimit), {
          signal,
          database: table.database,
          onProgress: progress,
        });
        return { tableColumns, result };
      },
      (preview) => {
        this.cache.setColumns(table, preview.tableColumns);
        apply(previewView(table, preview));
      },
    );
  }

  private async enterSelection(): Promise<void> {
    const view = this.view;
    if (!isListView(view)) throw new NavigationError('invalid_intent', 'Nothing to select in the query editor.');
    const index = selectedItemIndex(view);
    if (index === null) return;

    switch (view.kind) {
      case 'connection_list':
        return this.connect(view.items[index].id);
      case 'database_list':
        return this.enterDatabase(view.items[index].name);
      case 'schema_list':
        return this.enterSchema(view.items[index].name);
      case 'table_list':
        return this.enterTable(view.items[index].name);
      case 'column_list':
        return this.enterRows();
      case 'row_browser':
      case 'result_view':
        return;
    }
  }

  // -- query -------------------------------------------------------------

  private async openEditor(text: string | undefined): Promise<void> {
    this.requireSession();
    return this.show({ kind: 'query_editor', text: text ?? this.lastQuery });
  }

  private runQuery(text: string | undefined): Promise<void> {
    const view = this.view;
    const session = this.requireSession();
    let sql: string;
    if (view.kind === 'query_editor') {
      sql = text ?? view.text;
      this.view = { ...view, text: sql };
    } else if (view.kind === 'result_view') {
      sql = text ?? view.sql;
    } else {
      throw new NavigationError('invalid_intent', 'Queries run from the query editor.');
    }
    this.lastQuery = sql;

    return this.request(
      { slot: 'view', purpose: 'query', label: 'Running query', sql },
      (signal, progress) => this.executor.run(session, sql, { signal, onProgress: progress }),
      (result) => {
        const next = resultView(sql, result);
        const current = this.view;
        if (current.kind === 'result_view') {
          // A rerun replaces the result in place.
          this.view = current.sql === sql ? refreshed(current, { ...next, filter: current.filter }) : next;
        } else {
          this.push(next);
        }
      },
    );
  }

  private async cancel(): Promise<void> {
    const entry = this.inflight;
    if (!entry) return;
    this.abortInflight();

    if (entry.purpose === 'query') {
      const view = this.view;
      if (view.kind === 'result_view') {
        const top = this.stack[this.stack.length - 1];
        if (top && top.kind === 'query_editor') this.stack.pop();
        this.view = { kind: 'query_editor', text: entry.sql ?? view.sql };
      }
    }
    this.emit();
  }

  // -- back / refresh ------------------------------------------------------

  private async back(): Promise<void> {
    this.abortInflight();
    const previous = this.stack.pop();
    if (!previous) return;

    this.error = null;
    const closing = previous.kind === 'connection_list' ? this.endSession() : null;
    this.view = previous;
    this.emit();
    if (closing) await closing;
  }

  private async refresh(): Promise<void> {
    const view = this.view;
    switch (view.kind) {
      case 'connection_list':
        return this.request(
          { slot: 'view', purpose: 'profiles', label: 'Loading connections' },
          (signal) => raceAbort(this.deps.profiles.listProfiles(), signal),
          (profiles) => {
            const current = this.view;
            if (current.kind === 'connection_list') this.view = refreshed(current, { ...current, items: profiles });
          },
        );
      case 'database_list': {
        const session = this.requireSession();
        return this.request(
          { slot: 'view', purpose: 'catalog', label: 'Reloading databases' },
          (signal) => raceAbort(session.listDatabases(), signal),
          (databases) => {
            this.cache.setDatabases(databases);
            const current = this.view;
            if (current.kind === 'database_list') this.view = refreshed(current, { ...current, items: databases });
          },
        );
      }
      case 'schema_list': {
        const session = this.requireSession();
        return this.request(
          { slot: 'view', purpose: 'catalog', label: `Reloading schemas in ${view.database.name}` },
          (signal) => raceAbort(session.listSchemas(view.database), signal),
          (schemas) => {
            this.cache.setSchemas(view.database, schemas);
            const current = this.view;
            if (current.kind === 'schema_list') this.view = refreshed(current, { ...current, items: schemas });
          },
        );
      }
      case 'table_list': {
        const session = this.requireSession();
        return this.request(
          { slot: 'view', purpose: 'catalog', label: `Reloading tables in ${view.schema.name}` },
          (signal) => raceAbort(session.listTables(view.schema), signal),
          (tables) => {
            this.cache.setTables(view.schema, tables);
            const current = this.view;
            if (current.kind === 'table_list') this.view = refreshed(current, { ...current, items: tables });
          },
        );
      }
      case 'column_list': {
        const session = this.requireSession();
        return this.request(
          { slot: 'view', purpose: 'catalog', label: `Reloading columns of ${view.table.name}` },
          (signal) => raceAbort(session.listColumns(view.table), signal),
          (columns) => {
            this.cache.setColumns(view.table, columns);
            const current = this.view;
            if (current.kind === 'column_list') this.view = refreshed(current, { ...current, items: columns });
          },
        );
      }
      case 'row_browser':
        return this.loadPreview(view.table, (next) => {
          const current = this.view;
          if (current.kind === 'row_browser') this.view = refreshed(current, { ...next, filter: current.filter });
        });
      case 'result_view':
        return this.runQuery(view.sql);
      case 'query_editor':
        return;
    }
  }

  // -- list selection ------------------------------------------------------

  private async select(index: number): Promise<void> {
    const view = this.view;
    if (!isListView(view)) throw new NavigationError('invalid_intent', 'Nothing to select in the query editor.');
    const count = visibleIndexes(view).length;
    const selected = count === 0 ? 0 : Math.min(Math.max(Math.trunc(index), 0), count - 1);
    this.view = { ...view, selected };
    this.emit();
  }

  private async filter(query: string): Promise<void> {
    const view = this.view;
    if (!isListView(view)) throw new NavigationError('invalid_intent', 'Nothing to filter in the query editor.');
    this.view = { ...view, filter: query, selected: 0 };
    this.emit();
  }

  // -- plumbing ------------------------------------------------------------

  private async request<T>(
    plan: RequestPlan,
    task: (signal: AbortSignal, progress: (rowsFetched: number) => void) => Promise<T>,
    apply: (value: T) => void,
    discard?: (value: T) => Promise<void>,
  ): Promise<void> {
    this.abortInflight();
    const controller = new AbortController();
    const unlink = follow(this.scope.signal, controller);
    const entry: InFlight = { ...plan, seq: ++this.seq, controller, rowsFetched: 0 };
    this.latest.set(entry.slot, entry.seq);
    this.inflight = entry;
    this.error = null;
    this.emit();

    let value: T;
    try {
      value = await task(controller.signal, (rowsFetched) => this.progress(entry, rowsFetched));
    } catch (err) {
      // A superseded request has no say over the state, failures included.
      if (this.isCurrent(entry)) {
        this.inflight = null;
        this.error = describeError(err);
        this.emit();
      }
      return;
    } finally {
      unlink();
    }

    if (!this.isCurrent(entry)) {
      if (discard) await discard(value);
      return;
    }
    this.inflight = null;
    apply(value);
    this.emit();
  }

  private isCurrent(entry: InFlight): boolean {
    return this.latest.get(entry.slot) === entry.seq && !entry.controller.signal.aborted;
  }

  private progress(entry: InFlight, rowsFetched: number): void {
    if (this.inflight !== entry) return;
    entry.rowsFetched = rowsFetched;
    this.emit();
  }

  private abortInflight(): void {
    const entry = this.inflight;
    if (!entry) return;
    this.inflight = null;
    entry.controller.abort();
  }

  /** Switch to a view whose data is already at hand. */
  private async show(next: ViewState): Promise<void> {
    this.abortInflight();
    this.push(next);
    this.emit();
  }

  private push(next: ViewState): void {
    this.stack.push(this.view);
    this.view = next;
    this.error = null;
  }

  private requireView<K extends ViewKind>(kind: K, action: string): Extract<ViewState, { kind: K }> {
    const view = this.view;
    if (!isView(view, kind)) {
      throw new NavigationError('invalid_intent', `${action} is not available from ${view.kind.replace('_', ' ')}.`);
    }
    return view;
  }

  private requireSession(): Session {
    if (!this.session) throw new NavigationError('not_connected', 'Not connected. Open a connection first.');
    return this.session;
  }

  /** Detach the session and its caches now; the returned promise settles when it is closed. */
  private async endSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.profile = null;
    this.scope.abort();
    this.scope = new AbortController();
    this.cache.clear();
    if (session) await this.closeQuietly(session);
  }

  private async closeQuietly(session: Session): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      this.warn(`Error while closing the session: ${errorMessage(err)}`);
    }
  }

  private emit(): void {
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
