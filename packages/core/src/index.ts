// Main exports for the brushgen core package
export { generateBrushes } from './generate.js';
export type { GenerateOptions, GenerationResult } from './generate.js';
export type { BrushRecord, ThemeKey, ThemeValues, TreeItem } from './types.js';
export {
  propertyName,
  containerParts,
  containerTypeName,
  nameWithoutPrefix,
  isValidBrushName,
  DEFAULT_BRUSH_PREFIX
} from './brush-name.js';
export { THEME_KEYS, themeValue, themeDisplayName } from './theme-values.js';
export { buildBrushTree, createTreeItem, walkTree } from './brush-tree.js';
export { parseBrushes, loadBrushes, sortBrushes, withoutIgnored, compareBrushNames } from './brush-source.js';
export { loadConfig, resolveOutputPaths, DEFAULT_CONFIG, CONFIG_FILE_NAME } from './config.js';
export type { BrushgenConfig, OutputPaths } from './config.js';
export { findRepoRoot } from './project-root.js';
export { fileResourceIO, createMemoryResourceIO } from './resource-io.js';
export type { ResourceIO, MemoryResourceIO } from './resource-io.js';
export { emitThemeDictionary, emitThemeDictionaries, themeBinding, isColorLiteral } from './emitters/theme-dictionary.js';
export { emitObsoleteBrushes, obsoleteBrushBindings, spliceAtMarker, INSERT_MARKER } from './emitters/obsolete-brushes.js';
export { emitThemeClass } from './emitters/theme-class.js';
export * from './errors.js';
