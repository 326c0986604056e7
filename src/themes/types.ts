/**
 * Theme color palette. Frames refer to these slots by name, never to colors.
 */
export interface Theme {
  name: string;
  background: string;
  foreground: string;
  accent: string;
  accentSecondary: string;
  muted: string;
  error: string;
  warning: string;
  success: string;
  info: string;
  border: string;
  borderFocused: string;
}

export type ThemeName = 'nano-dark' | 'nano-light';
