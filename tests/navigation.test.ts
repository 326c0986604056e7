/**
 * Navigation state machine: page and sub-page selection, filter editing,
 * confirmation of destructive actions and the Logs view bindings.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { activeModel, activeViewId, createAppState, viewModel, type AppState } from '../src/core/app-state';
import { escapeSequence, keyToken, printableText } from '../src/core/keys';
import { dispatch } from '../src/core/navigation';
import type { KeyEvent, Row, SpecialKey } from '../src/types';
import { defaultSettings } from '../src/utils/config';

const char = (c: string, ctrl = false): KeyEvent => ({ kind: 'char', char: c, ctrl });
const special = (key: SpecialKey): KeyEvent => ({ kind: 'special', key });

function press(state: AppState, ...keys: Array<string | KeyEvent>) {
  return keys.flatMap(k => dispatch(state, typeof k === 'string' ? char(k) : k));
}

function rows(count: number): Row[] {
  return Array.from({ length: count }, (_, i) => ({
    key: String(i),
    cells: { user: { text: `user${i}` } },
    searchText: `user${i}`,
  }));
}

describe('keys', () => {
  it('turns events into binding tokens', () => {
    expect(keyToken(char('q'))).toBe('q');
    expect(keyToken(char('C', true))).toBe('ctrl+c');
    expect(keyToken(special('pageDown'))).toBe('pageDown');
  });

  it('keeps only typeable text', () => {
    expect(printableText(char('a'))).toBe('a');
    expect(printableText(char('c', true))).toBe('');
    expect(printableText(char('\u001b'))).toBe('');
    expect(printableText(special('up'))).toBe('');
  });

  it('maps Home and End escape sequences only', () => {
    expect(escapeSequence('\u001b[H')).toBe('home');
    expect(escapeSequence('[4~')).toBe('end');
    expect(escapeSequence('constructor')).toBeUndefined();
    expect(escapeSequence('toString')).toBeUndefined();
  });
});

/** Words that name members every plain object inherits */
const INHERITED_NAMES = ['valueOf', '__proto__', 'constructor', 'toString', 'hasOwnProperty'];

describe('dispatch', () => {
  let state: AppState;

  beforeEach(() => {
    state = createAppState({
      settings: defaultSettings(),
      resolver: { resolve: async () => null },
      identity: { version: '2.5.5', host: 'localhost:6032' },
      size: { columns: 100, rows: 40 },
      now: 0,
    });
  });

  // ── Pages ──

  it('selects pages by digit and reports the view change', () => {
    expect(press(state, '2')).toEqual([{ type: 'view-changed', from: 'frontend.user-host', to: 'backend.servers' }]);
    expect(state.nav.page).toBe(1);
  });

  it('ignores digits beyond the last page', () => {
    expect(press(state, '9')).toEqual([]);
    expect(state.nav.page).toBe(0);
  });

  it('reports nothing when the active view does not move', () => {
    expect(press(state, '1')).toEqual([]);
  });

  it('wraps page cycling at both ends', () => {
    press(state, special('left'));
    expect(activeViewId(state)).toBe('logs.tail');
    press(state, special('right'));
    expect(activeViewId(state)).toBe('frontend.user-host');
  });

  it('cycles sub-pages with Tab and wraps', () => {
    press(state, special('tab'));
    expect(activeViewId(state)).toBe('frontend.by-user');
    press(state, special('tab'), special('tab'), special('tab'));
    expect(activeViewId(state)).toBe('frontend.patterns');
    press(state, special('tab'));
    expect(activeViewId(state)).toBe('frontend.user-host');
  });

  it('does nothing on Tab for a single-view page', () => {
    press(state, '2');
    expect(press(state, special('tab'))).toEqual([]);
  });

  it('remembers the sub-page of every page', () => {
    press(state, special('tab'), '3', special('tab'), special('tab'), '1');
    expect(activeViewId(state)).toBe('frontend.by-user');
    press(state, '3');
    expect(activeViewId(state)).toBe('runtime.backends');
  });

  // ── Scrolling ──

  it('keeps each view scroll position across page switches', () => {
    const model = viewModel(state, 'frontend.user-host');
    model.setViewport(80, 2);
    model.applyData(rows(10));
    press(state, 'j', 'j', 'j');
    expect(model.scrollOffset).toBe(3);
    press(state, '3', '1');
    expect(model.scrollOffset).toBe(3);
    press(state, 'G');
    expect(model.scrollOffset).toBe(8);
    press(state, 'g');
    expect(model.scrollOffset).toBe(0);
  });

  // ── Filtering ──

  it('edits the filter of the active view', () => {
    activeModel(state).applyData(rows(12));
    press(state, '/');
    expect(state.nav.mode).toBe('filtering');
    press(state, '1', '1', special('backspace'), 'q');
    expect(activeModel(state).filterQuery).toBe('1q');
    expect(state.quit).toBe(false);
    press(state, special('return'));
    expect(state.nav.mode).toBe('browsing');
    expect(activeModel(state).filterQuery).toBe('1q');
  });

  it('clears the filter on Escape in either mode', () => {
    press(state, '/', 'a', 'b', special('escape'));
    expect(state.nav.mode).toBe('browsing');
    expect(activeModel(state).filterQuery).toBe('');
    press(state, '/', 'x', special('return'), special('escape'));
    expect(activeModel(state).filterQuery).toBe('');
  });

  it('keeps filters per view', () => {
    press(state, '/', 'a', special('return'), special('tab'));
    expect(activeModel(state).filterQuery).toBe('');
    expect(viewModel(state, 'frontend.user-host').filterQuery).toBe('a');
  });

  it('types pasted words that name inherited object members', () => {
    press(state, '/');
    for (const word of INHERITED_NAMES) {
      expect(press(state, word)).toEqual([]);
    }
    expect(activeModel(state).filterQuery).toBe(INHERITED_NAMES.join(''));
    expect(state.nav.mode).toBe('filtering');
  });

  it('ignores those words while browsing', () => {
    for (const word of INHERITED_NAMES) {
      expect(press(state, word)).toEqual([]);
    }
    press(state, '5');
    for (const word of INHERITED_NAMES) {
      expect(press(state, word)).toEqual([]);
    }
    expect(state.nav.mode).toBe('browsing');
    expect(activeModel(state).filterQuery).toBe('');
  });

  it('quits on Ctrl+C while filtering', () => {
    press(state, '/');
    expect(press(state, char('c', true))).toEqual([{ type: 'quit' }]);
  });

  // ── Commands ──

  it('requests a refresh on r and quits on q', () => {
    expect(press(state, 'r')).toEqual([{ type: 'refresh' }]);
    expect(press(state, 'q')).toEqual([{ type: 'quit' }]);
  });

  // ── Confirmation ──

  it('runs the view clear action after confirmation', () => {
    press(state, special('tab'), special('tab'), special('tab'), special('tab'));
    expect(press(state, 'c')).toEqual([]);
    expect(state.nav.mode).toBe('confirming');
    expect(state.nav.pending).toEqual({ action: 'reset-digest', view: 'frontend.patterns' });
    expect(press(state, 'y')).toEqual([{ type: 'execute', action: 'reset-digest' }]);
    expect(state.nav.mode).toBe('browsing');
    expect(state.nav.pending).toBeNull();
  });

  it('accepts Enter as confirmation', () => {
    press(state, '2', 'c');
    expect(press(state, special('return'))).toEqual([{ type: 'execute', action: 'reset-backend-stats' }]);
  });

  it('cancels on any other key', () => {
    press(state, '2', 'c');
    expect(press(state, 'n')).toEqual([]);
    expect(state.nav.mode).toBe('browsing');
    expect(state.nav.pending).toBeNull();
    press(state, 'c');
    expect(press(state, special('escape'))).toEqual([]);
    expect(state.nav.mode).toBe('browsing');
  });

  it('does not page while confirming', () => {
    press(state, '2', 'c', '3');
    expect(state.nav.page).toBe(1);
  });

  it('ignores c on views without a clear action', () => {
    press(state, 'c');
    expect(state.nav.mode).toBe('browsing');
    expect(state.nav.pending).toBeNull();
  });

  // ── Logs ──

  it('starts the log view following, without debug lines', () => {
    const logs = viewModel(state, 'logs.tail');
    expect(logs.follow).toBe(true);
    expect([...(logs.scope ?? [])]).toEqual(['ERROR', 'WARN', 'INFO']);
  });

  it('binds follow and level scope keys on the log view', () => {
    press(state, '5');
    const logs = activeModel(state);
    press(state, 'a');
    expect(logs.follow).toBe(false);
    press(state, 'a');
    expect(logs.follow).toBe(true);
    press(state, 'e');
    expect([...(logs.scope ?? [])]).toEqual(['ERROR']);
    press(state, 'd');
    expect([...(logs.scope ?? [])]).toEqual(['DEBUG']);
    expect(press(state, 'r')).toEqual([]);
    expect(logs.scope).toBeNull();
  });

  it('leaves follow mode on a manual scroll', () => {
    press(state, '5', special('up'));
    expect(activeModel(state).follow).toBe(false);
  });

  it('types log keys into the filter instead of binding them', () => {
    press(state, '5', '/', 'e', 'r');
    expect(activeModel(state).filterQuery).toBe('er');
    expect([...(activeModel(state).scope ?? [])]).toEqual(['ERROR', 'WARN', 'INFO']);
  });
});
