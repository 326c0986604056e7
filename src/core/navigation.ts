import type { ActionId, KeyEvent, LogLevel, ViewId } from '../types';
import { PAGES, getPage } from '@views/index';
import {
  activeModel,
  activeViewDefinition,
  activeViewId,
  type AppState,
  type Mode,
} from './app-state';
import { keyToken, printableText } from './keys';

/**
 * Side effects a transition asks the control loop to perform
 */
export type Effect =
  | { type: 'quit' }
  | { type: 'refresh' }
  | { type: 'execute'; action: ActionId }
  | { type: 'view-changed'; from: ViewId; to: ViewId };

type Binding = (state: AppState, key: KeyEvent) => Effect[];

/**
 * Keyed by binding token. A Map, since tokens come straight from typed or
 * pasted input.
 */
type BindingTable = ReadonlyMap<string, Binding>;

function bindings(entries: Readonly<Record<string, Binding>>): BindingTable {
  return new Map(Object.entries(entries));
}

/** Matches any printable character not bound explicitly */
const PRINTABLE = '<printable>';
/** Matches every key not bound explicitly */
const ANY = '<any>';

const none: Effect[] = [];

function quit(): Effect[] {
  return [{ type: 'quit' }];
}

/**
 * Run `change` and report a view switch if the active view moved
 */
function switching(state: AppState, change: () => void): Effect[] {
  const from = activeViewId(state);
  change();
  const to = activeViewId(state);
  return from === to ? none : [{ type: 'view-changed', from, to }];
}

export function selectPage(state: AppState, index: number): Effect[] {
  if (index < 0 || index >= PAGES.length) return none;
  return switching(state, () => {
    state.nav.page = index;
  });
}

export function cyclePage(state: AppState, delta: number): Effect[] {
  const count = PAGES.length;
  return selectPage(state, (((state.nav.page + delta) % count) + count) % count);
}

export function nextSubPage(state: AppState): Effect[] {
  const page = getPage(state.nav.page);
  const current = state.nav.subPages[state.nav.page] ?? 0;
  return switching(state, () => {
    state.nav.subPages[state.nav.page] = (current + 1) % page.views.length;
  });
}

/**
 * Scroll the active view. Any manual scroll leaves follow mode.
 */
function scrolling(move: (state: AppState) => void): Binding {
  return state => {
    activeModel(state).setFollow(false);
    move(state);
    return none;
  };
}

function setMode(state: AppState, mode: Mode): void {
  state.nav.mode = mode;
  if (mode !== 'confirming') state.nav.pending = null;
}

function requestClear(state: AppState): Effect[] {
  const view = activeViewDefinition(state);
  if (!view.clearAction) return none;
  state.nav.pending = { action: view.clearAction, view: view.id };
  state.nav.mode = 'confirming';
  return none;
}

const up = scrolling(s => activeModel(s).scroll(-1));
const down = scrolling(s => activeModel(s).scroll(1));
const pageUp = scrolling(s => activeModel(s).pageUp());
const pageDown = scrolling(s => activeModel(s).pageDown());
const top = scrolling(s => activeModel(s).jumpTop());
const bottom = scrolling(s => activeModel(s).jumpBottom());

const pageDigits: Readonly<Record<string, Binding>> = Object.fromEntries(
  ['1', '2', '3', '4', '5', '6', '7', '8', '9'].map((digit, i): [string, Binding] => [
    digit,
    state => selectPage(state, i),
  ]),
);

const browsing = bindings({
  ...pageDigits,
  left: state => cyclePage(state, -1),
  right: state => cyclePage(state, 1),
  tab: state => nextSubPage(state),
  up,
  k: up,
  down,
  j: down,
  pageUp,
  u: pageUp,
  pageDown,
  d: pageDown,
  home: top,
  g: top,
  end: bottom,
  G: bottom,
  '/': state => {
    setMode(state, 'filtering');
    return none;
  },
  escape: state => {
    activeModel(state).applyFilter('');
    return none;
  },
  r: () => [{ type: 'refresh' }],
  c: requestClear,
  q: quit,
  'ctrl+c': quit,
});

const filtering = bindings({
  [PRINTABLE]: (state, key) => {
    const model = activeModel(state);
    model.applyFilter(model.filterQuery + printableText(key));
    return none;
  },
  backspace: state => {
    const model = activeModel(state);
    model.applyFilter([...model.filterQuery].slice(0, -1).join(''));
    return none;
  },
  escape: state => {
    activeModel(state).applyFilter('');
    setMode(state, 'browsing');
    return none;
  },
  return: state => {
    setMode(state, 'browsing');
    return none;
  },
  'ctrl+c': quit,
});

function confirm(state: AppState): Effect[] {
  const pending = state.nav.pending;
  setMode(state, 'browsing');
  return pending ? [{ type: 'execute', action: pending.action }] : none;
}

const confirming = bindings({
  y: confirm,
  Y: confirm,
  return: confirm,
  'ctrl+c': quit,
  [ANY]: state => {
    setMode(state, 'browsing');
    return none;
  },
});

export const MODE_BINDINGS: Readonly<Record<Mode, BindingTable>> = {
  browsing,
  filtering,
  confirming,
};

function scopeTo(level: LogLevel): Binding {
  return state => {
    activeModel(state).setScope([level]);
    return none;
  };
}

/**
 * Per-view bindings, consulted before the mode table while browsing
 */
export const VIEW_BINDINGS: Readonly<Partial<Record<ViewId, BindingTable>>> = {
  'logs.tail': bindings({
    a: state => {
      const model = activeModel(state);
      model.setFollow(!model.follow);
      return none;
    },
    e: scopeTo('ERROR'),
    w: scopeTo('WARN'),
    i: scopeTo('INFO'),
    d: scopeTo('DEBUG'),
    r: state => {
      activeModel(state).setScope(null);
      return none;
    },
  }),
};

function lookup(table: BindingTable | undefined, token: string, key: KeyEvent): Binding | undefined {
  if (!table) return undefined;
  const exact = table.get(token);
  if (exact) return exact;
  const printable = table.get(PRINTABLE);
  if (printable && printableText(key).length > 0) return printable;
  return table.get(ANY);
}

/**
 * Apply one key to the state through the dispatch table of the current mode
 */
export function dispatch(state: AppState, key: KeyEvent): Effect[] {
  const token = keyToken(key);
  const mode = state.nav.mode;
  const extra = mode === 'browsing' ? VIEW_BINDINGS[activeViewId(state)] : undefined;
  const binding = extra?.get(token) ?? lookup(MODE_BINDINGS[mode], token, key);
  return binding ? binding(state, key) : none;
}
