/**
 * Built-in palettes, selected by the `theme` setting
 */
export { nanoDark } from './nano-dark.js';
export { nanoLight } from './nano-light.js';
export type { Theme, ThemeName } from './types.js';

import { nanoDark } from './nano-dark.js';
import { nanoLight } from './nano-light.js';
import type { Theme, ThemeName } from './types.js';

export const themes: Readonly<Record<ThemeName, Theme>> = {
  'nano-dark': nanoDark,
  'nano-light': nanoLight,
};

export function getTheme(name: ThemeName): Theme {
  return themes[name];
}
