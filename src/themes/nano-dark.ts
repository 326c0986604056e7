import type { Theme } from './types.js';

/**
 * Default dark palette. Activity levels map onto success (light load),
 * warning (moderate) and error (saturated, hot, offline).
 */
export const nanoDark: Theme = {
  name: 'Nano Dark',
  background: '#1a1a1a',
  foreground: '#e0e0e0',
  accent: '#7FFFD4', // headings, active tab
  accentSecondary: '#CC5500', // busy rules
  muted: '#666666',
  error: '#ff5555',
  warning: '#ffaa00',
  success: '#50fa7b',
  info: '#bb9af7', // follow marker, connections graph
  border: '#444444',
  borderFocused: '#7FFFD4',
};
