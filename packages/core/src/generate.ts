import chalk from 'chalk';
import { resolve } from 'node:path';
import { logger } from '@brushgen/logger';
import { buildBrushTree, walkTree } from './brush-tree.js';
import { loadBrushes, sortBrushes, withoutIgnored } from './brush-source.js';
import { loadConfig, resolveOutputPaths, type BrushgenConfig } from './config.js';
import { RepoRootNotFoundError } from './errors.js';
import { emitObsoleteBrushes, obsoleteBrushBindings } from './emitters/obsolete-brushes.js';
import { emitThemeClass } from './emitters/theme-class.js';
import { emitThemeDictionary } from './emitters/theme-dictionary.js';
import { findRepoRoot } from './project-root.js';
import { fileResourceIO, type ResourceIO } from './resource-io.js';
import { THEME_KEYS } from './theme-values.js';

const log = logger.generate;

export interface GenerateOptions {
  /** Directory the input files are resolved from and the repo root search starts at */
  cwd?: string;
  /** Skip the `.git` search and write below this directory */
  repoRoot?: string;
  /** Values applied over the loaded configuration */
  config?: Partial<BrushgenConfig>;
  io?: ResourceIO;
}

export interface GenerationResult {
  repoRoot: string;
  /** Brushes written to each theme dictionary, sentinel included */
  brushCount: number;
  /** Classes in the accessor, root excluded */
  classCount: number;
  obsoleteAliasCount: number;
  /** Output paths in write order */
  written: string[];
}

/**
 * Regenerate every brush resource from the input file.
 *
 * Steps run strictly one after another: locate the repo root and its config
 * (the config names the input), load, sort, drop the sentinel for the tree
 * and alias outputs, then write the light and dark dictionaries, the
 * obsolete aliases and the accessor class. The first failure aborts the run;
 * documents already written stay written.
 */
export async function generateBrushes(options: GenerateOptions = {}): Promise<GenerationResult> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const io = options.io ?? fileResourceIO;

  const repoRoot = options.repoRoot ?? findRepoRoot(cwd);
  if (!repoRoot) {
    throw new RepoRootNotFoundError(cwd);
  }

  const config: BrushgenConfig = { ...(await loadConfig(repoRoot, io)), ...options.config };
  const outputs = resolveOutputPaths(config, repoRoot);

  log.debug(chalk.blue('Step 1: Loading brushes...'));
  const brushes = sortBrushes(await loadBrushes(resolve(cwd, config.inputPath), io));
  const activeBrushes = withoutIgnored(brushes, config.ignoredBrushName);
  log.debug(chalk.gray(`   ${brushes.length} brushes, ${brushes.length - activeBrushes.length} ignored`));

  log.debug(chalk.blue('Step 2: Building brush tree...'));
  const tree = buildBrushTree(activeBrushes);
  const classCount = [...walkTree(tree)].length - 1;
  log.debug(chalk.gray(`   ${classCount} classes`));

  const written: string[] = [];
  const write = async (path: string, content: string) => {
    await io.write(path, content);
    written.push(path);
    log.debug(chalk.green(`   ✓ ${path}`));
  };

  log.debug(chalk.blue('Step 3: Writing theme dictionaries...'));
  for (const theme of THEME_KEYS) {
    await write(outputs.themes[theme], emitThemeDictionary(theme, brushes, config));
  }

  log.debug(chalk.blue('Step 4: Writing obsolete brushes...'));
  const template = await io.read(resolve(cwd, config.obsoleteTemplatePath));
  await write(outputs.obsoleteBrushes, emitObsoleteBrushes(activeBrushes, template));

  log.debug(chalk.blue('Step 5: Writing accessor class...'));
  await write(outputs.themeClass, emitThemeClass(tree, config));

  return {
    repoRoot,
    brushCount: brushes.length,
    classCount,
    obsoleteAliasCount: obsoleteBrushBindings(activeBrushes).length,
    written,
  };
}
