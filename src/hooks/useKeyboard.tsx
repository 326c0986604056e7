import { useInput } from 'ink';
import type { Key } from 'ink';
import { toKeyEvent } from '@core/keys';
import type { KeyEvent } from '../types';

/**
 * Normalized keyboard input
 *
 * Every keypress Ink reports is turned into a KeyEvent and handed to
 * `onKey`; the dispatch tables decide what it means.
 *
 * @example
 * ```tsx
 * useKeyboard(event => loop.enqueueKey(event));
 * ```
 */
export const useKeyboard = (onKey: (event: KeyEvent) => void) => {
  useInput((input: string, key: Key) => {
    const event = toKeyEvent(input, key);
    if (event) onKey(event);
  });
};
