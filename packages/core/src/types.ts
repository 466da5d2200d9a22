/**
 * Shared types for brush records and the brush hierarchy
 */

/**
 * Theme columns every brush carries a value for
 */
export type ThemeKey = 'light' | 'dark';

/**
 * Per-theme values. A value starting with `#` is a literal color, anything
 * else is the key of another resource.
 */
export type ThemeValues = Readonly<Record<ThemeKey, string>>;

/**
 * One named brush as read from the input file
 */
export interface BrushRecord {
  readonly name: string;
  readonly themeValues: ThemeValues;
  /** Extra keys that resolve to the same value as `name` */
  readonly alternateKeys?: readonly string[];
  /** Deprecated keys that alias `name` */
  readonly obsoleteKeys?: readonly string[];
}

/**
 * Node of the brush hierarchy. The root has an empty name.
 */
export interface TreeItem<T> {
  readonly name: string;
  readonly children: TreeItem<T>[];
  readonly values: T[];
}
