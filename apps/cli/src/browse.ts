/**
 * Interactive browser: a readline loop that turns typed commands into
 * navigator intents and prints the snapshot after each one.
 */

import { createInterface } from 'node:readline';
import type { Intent, NavigationStateMachine, ViewState } from '@quarry/core';
import { renderSnapshot } from './render.js';

export type BrowseCommand =
  | { type: 'intents'; intents: Intent[] }
  | { type: 'print' }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'invalid'; message: string };

export const BROWSE_HELP = [
  'Commands:',
  '  <n>            select entry n and open it',
  '  (empty line)   open the selected entry',
  '  open [name]    open an entry by name, or the selected one',
  '  select <n>     move the selection to entry n',
  '  rows           browse rows of the current table',
  '  /text          filter the list; "/" alone clears the filter',
  '  back | ..      go back one level',
  '  refresh | r    reload the current view',
  '  edit [sql]     open the query editor',
  '  run [sql]      run the editor text, or the given SQL',
  '  sql <sql>      open the editor with this SQL and run it',
  '  cancel         cancel what is loading (Ctrl-C does the same)',
  '  dismiss        clear the error banner',
  '  ls             show the current view again',
  '  quit | exit    leave',
].join('\n');

/** Words that stay commands inside the query editor; any other line there is SQL */
const EDITOR_COMMANDS = new Set(['q', 'quit', 'exit', 'help', '?', 'ls', 'back', '..', 'edit', 'run', 'cancel', 'dismiss']);

function intents(...list: Intent[]): BrowseCommand {
  return { type: 'intents', intents: list };
}

function opensSelection(view: ViewState): boolean {
  return view.kind !== 'query_editor' && view.kind !== 'row_browser' && view.kind !== 'result_view';
}

function openByName(view: ViewState, name: string): BrowseCommand {
  switch (view.kind) {
    case 'connection_list': {
      const profile = view.items.find((item) => item.name === name);
      return profile
        ? intents({ type: 'enter', target: { type: 'connection', profileId: profile.id } })
        : { type: 'invalid', message: `No connection named "${name}".` };
    }
    case 'database_list':
      return intents({ type: 'enter', target: { type: 'database', name } });
    case 'schema_list':
      return intents({ type: 'enter', target: { type: 'schema', name } });
    case 'table_list':
      return intents({ type: 'enter', target: { type: 'table', name } });
    default:
      return { type: 'invalid', message: 'Nothing to open by name here.' };
  }
}

function position(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return n >= 1 ? n - 1 : null;
}

export function parseBrowseCommand(line: string, view: ViewState): BrowseCommand {
  const input = line.trim();
  const space = input.search(/\s/);
  const word = (space < 0 ? input : input.slice(0, space)).toLowerCase();
  const rest = space < 0 ? '' : input.slice(space + 1).trim();

  if (view.kind === 'query_editor' && input.length > 0 && !EDITOR_COMMANDS.has(word)) {
    return intents({ type: 'edit_query', text: input }, { type: 'run_query' });
  }

  if (input.startsWith('/')) {
    return intents({ type: 'filter', query: input.slice(1) });
  }

  const index = position(input);
  if (index !== null) {
    const select: Intent = { type: 'select', index };
    return opensSelection(view) ? intents(select, { type: 'enter', target: { type: 'selection' } }) : intents(select);
  }

  switch (word) {
    case '':
      return opensSelection(view) ? intents({ type: 'enter', target: { type: 'selection' } }) : { type: 'print' };
    case 'q':
    case 'quit':
    case 'exit':
      return { type: 'quit' };
    case 'help':
    case '?':
      return { type: 'help' };
    case 'ls':
      return { type: 'print' };
    case 'open':
      return rest ? openByName(view, rest) : intents({ type: 'enter', target: { type: 'selection' } });
    case 'select': {
      const target = position(rest);
      return target === null
        ? { type: 'invalid', message: 'Usage: select <n>' }
        : intents({ type: 'select', index: target });
    }
    case 'rows':
      return intents({ type: 'enter', target: { type: 'rows' } });
    case 'back':
    case '..':
      return intents({ type: 'back' });
    case 'refresh':
    case 'r':
      return intents({ type: 'refresh' });
    case 'edit':
      return intents({ type: 'enter', target: { type: 'query_editor', text: rest || undefined } });
    case 'run':
      return intents({ type: 'run_query', text: rest || undefined });
    case 'sql':
      return rest
        ? intents({ type: 'enter', target: { type: 'query_editor', text: rest } }, { type: 'run_query' })
        : { type: 'invalid', message: 'Usage: sql <statement>' };
    case 'cancel':
      return intents({ type: 'cancel' });
    case 'dismiss':
      return intents({ type: 'dismiss_error' });
  }

  return { type: 'invalid', message: `Unknown command "${word}". Type "help" for the list.` };
}

export interface BrowseIo {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  print: (text: string) => void;
}

/** Resolves when the user quits; the caller closes the navigator. */
export function runBrowse(machine: NavigationStateMachine, io: BrowseIo): Promise<void> {
  const rl = createInterface({ input: io.input, output: io.output, prompt: 'quarry> ' });
  const show = (): void => io.print(renderSnapshot(machine.snapshot()));
  let closed = false;
  const prompt = (): void => {
    if (!closed) rl.prompt();
  };

  const perform = async (list: Intent[]): Promise<void> => {
    for (const intent of list) {
      const before = machine.snapshot().error;
      const done = machine.dispatch(intent);
      const { loading } = machine.snapshot();
      if (loading) io.print(`... ${loading.label}`);
      await done;
      const after = machine.snapshot().error;
      if (after && after !== before) break;
    }
    show();
    prompt();
  };

  rl.on('line', (line) => {
    const command = parseBrowseCommand(line, machine.snapshot().view);
    switch (command.type) {
      case 'intents':
        void perform(command.intents);
        return;
      case 'print':
        show();
        break;
      case 'help':
        io.print(BROWSE_HELP);
        break;
      case 'invalid':
        io.print(command.message);
        break;
      case 'quit':
        rl.close();
        return;
    }
    prompt();
  });

  rl.on('SIGINT', () => {
    if (machine.snapshot().loading) {
      void perform([{ type: 'cancel' }]);
      return;
    }
    rl.close();
  });

  return new Promise((resolve) => {
    rl.on('close', () => {
      closed = true;
      resolve();
    });
    show();
    prompt();
  });
}
