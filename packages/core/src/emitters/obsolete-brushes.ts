/**
 * Obsolete brush aliases, spliced into a hand-maintained template
 */

import { logger } from '@brushgen/logger';
import { TemplateMarkerError } from '../errors.js';
import type { BrushRecord } from '../types.js';
import { staticResourceBinding } from './xml.js';

const log = logger.emit;

/**
 * Marker line replaced by the generated aliases
 */
export const INSERT_MARKER = /^\s*<!-- INSERT HERE -->\s*$/;

/**
 * One binding per obsolete key, each pointing at the owning brush's name
 * (never at its theme value)
 */
export function obsoleteBrushBindings(brushes: readonly BrushRecord[]): string[] {
  const bindings: string[] = [];
  for (const brush of brushes) {
    for (const obsoleteKey of brush.obsoleteKeys ?? []) {
      bindings.push(staticResourceBinding(obsoleteKey, brush.name));
    }
  }
  return bindings;
}

function markerLineIndex(templateLines: readonly string[]): number {
  const index = templateLines.findIndex(line => INSERT_MARKER.test(line));
  if (index === -1) {
    throw new TemplateMarkerError(INSERT_MARKER.source);
  }
  return index;
}

/**
 * Replace the first marker line of the template with `lines`. All other
 * lines, including their line endings, are kept as they are.
 *
 * @throws TemplateMarkerError when no line matches the marker
 */
export function spliceAtMarker(template: string, lines: readonly string[]): string {
  const templateLines = template.split('\n');
  const index = markerLineIndex(templateLines);
  const eol = templateLines[index].endsWith('\r') ? '\r' : '';
  templateLines.splice(index, 1, ...lines.map(line => `${line}${eol}`));
  return templateLines.join('\n');
}

/**
 * Emit the obsolete brushes dictionary. The brush list must already exclude
 * the ignored sentinel. With no obsolete keys at all the template comes back
 * unchanged.
 */
export function emitObsoleteBrushes(brushes: readonly BrushRecord[], template: string): string {
  const bindings = obsoleteBrushBindings(brushes);
  markerLineIndex(template.split('\n'));
  if (bindings.length === 0) {
    log.debug('No obsolete keys, template left unchanged');
    return template;
  }

  log.debug(`Emitted ${bindings.length} obsolete brush aliases`);
  return spliceAtMarker(template, bindings);
}
