import type { Key } from 'ink';
import type { KeyEvent, SpecialKey } from '../types';

const SPECIAL_KEYS: ReadonlyArray<[keyof Key, SpecialKey]> = [
  ['upArrow', 'up'],
  ['downArrow', 'down'],
  ['leftArrow', 'left'],
  ['rightArrow', 'right'],
  ['pageUp', 'pageUp'],
  ['pageDown', 'pageDown'],
  ['tab', 'tab'],
  ['escape', 'escape'],
  ['return', 'return'],
  ['backspace', 'backspace'],
  ['delete', 'backspace'],
];

/** Home/End arrive as raw escape sequences */
const SEQUENCES: ReadonlyMap<string, SpecialKey> = new Map<string, SpecialKey>([
  ['[H', 'home'],
  ['[1~', 'home'],
  ['[7~', 'home'],
  ['OH', 'home'],
  ['[F', 'end'],
  ['[4~', 'end'],
  ['[8~', 'end'],
  ['OF', 'end'],
]);

/** Home or End for a raw escape sequence, with or without the leading ESC */
export function escapeSequence(input: string): SpecialKey | undefined {
  return SEQUENCES.get(input.replace(/^\u001b/, ''));
}

/**
 * Normalize Ink's (input, key) pair into a KeyEvent. Returns null for
 * input that carries nothing the dashboard binds.
 */
export function toKeyEvent(input: string, key: Key): KeyEvent | null {
  for (const [flag, name] of SPECIAL_KEYS) {
    if (key[flag] === true) return { kind: 'special', key: name };
  }
  const sequence = escapeSequence(input);
  if (sequence) return { kind: 'special', key: sequence };
  if (input.length === 0) return null;
  return { kind: 'char', char: input, ctrl: key.ctrl };
}

/**
 * Token used by the dispatch tables: `q`, `ctrl+c`, `up`, `pageDown`
 */
export function keyToken(event: KeyEvent): string {
  if (event.kind === 'special') return event.key;
  return event.ctrl ? `ctrl+${event.char.toLowerCase()}` : event.char;
}

/** Text that may be typed into the filter prompt */
export function printableText(event: KeyEvent): string {
  if (event.kind !== 'char' || event.ctrl) return '';
  return event.char.replace(/[\u0000-\u001f\u007f]/g, '');
}
