/**
 * Strongly-typed accessor class mirroring the brush tree
 */

import { logger } from '@brushgen/logger';
import { propertyName } from '../brush-name.js';
import type { BrushgenConfig } from '../config.js';
import type { BrushRecord, TreeItem } from '../types.js';
import { DocumentWriter } from './document-writer.js';

const log = logger.emit;

const INDENT = '    ';

export type ThemeClassOptions = Pick<BrushgenConfig, 'accessorNamespace' | 'accessorClass' | 'generatorName'>;

function writeTreeItem(treeItem: TreeItem<BrushRecord>, writer: DocumentWriter, indentLevel: number): void {
  const indent = INDENT.repeat(indentLevel);
  const isRoot = treeItem.name.trim() === '';

  if (!isRoot) {
    writer.writeLine(`${indent}public class ${treeItem.name}`);
    writer.writeLine(`${indent}{`);
  }

  for (const brush of treeItem.values) {
    writer.writeLine(`${indent}${INDENT}public Color ${propertyName(brush.name)} { get; set; }`);
    writer.writeLine();
  }

  for (const child of treeItem.children) {
    writer.writeLine(`${indent}${INDENT}public ${child.name} ${child.name}s { get; set; } = new();`);
    writer.writeLine();
  }

  for (const child of treeItem.children) {
    writeTreeItem(child, writer, indentLevel + 1);
  }

  if (!isRoot) {
    writer.writeLine(`${indent}}`);
    writer.writeLine();
  }
}

/**
 * Emit the accessor class. The root node contributes members only; every
 * other node becomes a nested class with one `Color` property per brush and
 * one `<Name>s` property per child class.
 */
export function emitThemeClass(tree: TreeItem<BrushRecord>, options: ThemeClassOptions): string {
  const writer = new DocumentWriter();

  writer.writeBlock([
    '/// <summary>',
    `/// This file is auto-generated by ${options.generatorName}.`,
    '/// </summary>',
    'using System.Windows.Media;',
    '',
    `namespace ${options.accessorNamespace};`,
    '',
    `partial class ${options.accessorClass}`,
    '{',
  ].join('\n'));

  writeTreeItem(tree, writer, 0);

  writer.writeLine('}');

  log.debug(`Emitted ${options.accessorClass} accessor class`);
  return writer.toString();
}
