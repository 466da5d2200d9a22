/**
 * Light and dark resource dictionaries
 *
 * These documents are written from the full brush list. The ignored sentinel
 * brush is kept here on purpose: it is left out of the accessor class and the
 * obsolete dictionary only.
 */

import { logger } from '@brushgen/logger';
import type { BrushgenConfig } from '../config.js';
import { themeValue } from '../theme-values.js';
import type { BrushRecord, ThemeKey } from '../types.js';
import { DocumentWriter } from './document-writer.js';
import { solidColorBinding, staticResourceBinding } from './xml.js';

const log = logger.emit;

export type ThemeDictionaryOptions = Pick<BrushgenConfig, 'themePrefix' | 'colorsNamespace'>;

export function isColorLiteral(value: string): boolean {
  return value.startsWith('#');
}

/**
 * Binding for one key: a frozen brush for `#` colors, a resource reference
 * for anything else
 */
export function themeBinding(key: string, value: string): string {
  return isColorLiteral(value) ? solidColorBinding(key, value) : staticResourceBinding(key, value);
}

function dictionaryHeader(options: ThemeDictionaryOptions): string {
  return [
    '<ResourceDictionary xmlns="http://schemas.microsoft.com/winfx/2006/xaml/presentation"',
    '                    xmlns:x="http://schemas.microsoft.com/winfx/2006/xaml"',
    '                    xmlns:po="http://schemas.microsoft.com/winfx/2006/xaml/presentation/options"',
    `                    xmlns:colors="${options.colorsNamespace}">`,
    '  <ResourceDictionary.MergedDictionaries>',
    `    <ResourceDictionary Source="./Internal/${options.themePrefix}.BaseThemeColors.xaml" />`,
    '  </ResourceDictionary.MergedDictionaries>',
  ].join('\n');
}

/**
 * Emit the resource dictionary for one theme: each brush followed by its
 * alternate keys, all bound to the brush's value for that theme
 *
 * @param theme Theme column to read (`light` or `dark`, any case)
 */
export function emitThemeDictionary(
  theme: string,
  brushes: readonly BrushRecord[],
  options: ThemeDictionaryOptions
): string {
  const writer = new DocumentWriter();
  writer.writeBlock(dictionaryHeader(options));

  for (const brush of brushes) {
    const value = themeValue(brush.themeValues, theme);
    writer.writeLine(themeBinding(brush.name, value));

    for (const alternate of brush.alternateKeys ?? []) {
      writer.writeLine(themeBinding(alternate, value));
    }
  }

  writer.writeLine();
  writer.writeLine('</ResourceDictionary>');

  log.debug(`Emitted ${theme} dictionary for ${brushes.length} brushes`);
  return writer.toString();
}

/**
 * Both theme dictionaries, keyed by theme
 */
export function emitThemeDictionaries(
  brushes: readonly BrushRecord[],
  options: ThemeDictionaryOptions
): Record<ThemeKey, string> {
  return {
    light: emitThemeDictionary('light', brushes, options),
    dark: emitThemeDictionary('dark', brushes, options),
  };
}
