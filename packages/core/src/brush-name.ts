/**
 * Structural facts derived from a dotted brush name such as
 * `MaterialDesign.Brush.Button.Background`.
 */

import { MalformedBrushNameError } from './errors.js';

export const DEFAULT_BRUSH_PREFIX = 'MaterialDesign.Brush.';

/**
 * Minimum segments: namespace, category and the property itself
 */
export const MIN_NAME_SEGMENTS = 3;

function segments(name: string): string[] {
  const parts = name.split('.');
  if (parts.length < MIN_NAME_SEGMENTS) {
    throw new MalformedBrushNameError(name);
  }
  return parts;
}

/**
 * Whether a name can be used to derive property and container names
 */
export function isValidBrushName(name: string): boolean {
  return name.split('.').length >= MIN_NAME_SEGMENTS;
}

/**
 * Final segment of the name: `Background`
 */
export function propertyName(name: string): string {
  const parts = segments(name);
  return parts[parts.length - 1];
}

/**
 * Segments between the namespace/category pair and the property: `['Button']`
 */
export function containerParts(name: string): string[] {
  return segments(name).slice(2, -1);
}

/**
 * Container parts joined back with dots: `Button`
 */
export function containerTypeName(name: string): string {
  return containerParts(name).join('.');
}

/**
 * Name with the brush prefix removed: `Button.Background`
 */
export function nameWithoutPrefix(name: string, prefix: string = DEFAULT_BRUSH_PREFIX): string {
  return name.startsWith(prefix) ? name.slice(prefix.length) : name;
}
