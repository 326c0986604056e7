import type { Theme } from './types.js';

/**
 * Light palette with darker accents for bright terminals
 */
export const nanoLight: Theme = {
  name: 'Nano Light',
  background: '#f5f5f5',
  foreground: '#2a2a2a',
  accent: '#00897b',
  accentSecondary: '#d84315',
  muted: '#8a8a8a',
  error: '#d32f2f',
  warning: '#e65100',
  success: '#2e7d32',
  info: '#6a1b9a',
  border: '#cccccc',
  borderFocused: '#00897b',
};
