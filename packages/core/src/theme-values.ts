import { UnknownThemeError } from './errors.js';
import type { ThemeKey, ThemeValues } from './types.js';

export const THEME_KEYS: readonly ThemeKey[] = ['light', 'dark'];

function isThemeKey(value: string): value is ThemeKey {
  return (THEME_KEYS as readonly string[]).includes(value);
}

/**
 * Look up the value for a theme. Theme names are matched case-insensitively,
 * so `Light` and `light` read the same column.
 *
 * @throws UnknownThemeError for anything other than light or dark
 */
export function themeValue(values: ThemeValues, theme: string): string {
  const key = theme.toLowerCase();
  if (!isThemeKey(key)) {
    throw new UnknownThemeError(theme);
  }
  return values[key];
}

/**
 * File-name form of a theme key: `light` -> `Light`
 */
export function themeDisplayName(theme: ThemeKey): string {
  return theme.charAt(0).toUpperCase() + theme.slice(1);
}
