import React, { createContext, useContext, useMemo, type ReactNode } from 'react';
import type { Theme, ThemeName } from '@themes/types.js';
import { getTheme } from '@themes/index.js';

interface ThemeContextValue {
  theme: Theme;
  themeName: ThemeName;
}

const ThemeContext = createContext<ThemeContextValue | undefined>(undefined);

interface ThemeProviderProps {
  /** Fixed for the life of the process (from settings or --theme) */
  name: ThemeName;
  children: ReactNode;
}

/**
 * ThemeProvider component wraps the app and provides theme context
 */
export function ThemeProvider({ name, children }: ThemeProviderProps) {
  const value = useMemo(() => ({ theme: getTheme(name), themeName: name }), [name]);
  return <ThemeContext.Provider value={value}>{children}</ThemeContext.Provider>;
}

/**
 * useTheme hook to access current theme in components
 */
export function useTheme(): ThemeContextValue {
  const context = useContext(ThemeContext);
  if (!context) {
    throw new Error('useTheme must be used within a ThemeProvider');
  }
  return context;
}
