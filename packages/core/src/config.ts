import { join, resolve } from 'node:path';
import { z } from 'zod';
import json5 from 'json5';
import { logger } from '@brushgen/logger';
import { InvalidConfigError } from './errors.js';
import { fileResourceIO, isNotFound, type ResourceIO } from './resource-io.js';
import type { ThemeKey } from './types.js';
import { themeDisplayName } from './theme-values.js';

const log = logger.config;

export const CONFIG_FILE_NAME = 'brushgen.config.json';

export interface BrushgenConfig {
  /** Brush definitions, relative to the working directory */
  inputPath: string;
  /** Template for the obsolete brushes dictionary, relative to the working directory */
  obsoleteTemplatePath: string;
  /** Project directory receiving the outputs, relative to the repo root */
  projectDir: string;
  /** File-name prefix of the generated dictionaries */
  themePrefix: string;
  /** Brush kept out of the accessor class and the obsolete dictionary */
  ignoredBrushName: string;
  /** `xmlns:colors` value of the generated dictionaries */
  colorsNamespace: string;
  accessorNamespace: string;
  accessorClass: string;
  /** Tool name written into the generated-file comment */
  generatorName: string;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: BrushgenConfig = {
  inputPath: 'ThemeColors.json',
  obsoleteTemplatePath: 'MaterialDesignTheme.ObsoleteBrushes.xaml',
  projectDir: 'MaterialDesignThemes.Wpf',
  themePrefix: 'MaterialDesignTheme',
  ignoredBrushName: 'MaterialDesign.Brush.Ignored',
  colorsNamespace: 'clr-namespace:MaterialDesignColors;assembly=MaterialDesignColors',
  accessorNamespace: 'MaterialDesignThemes.Wpf',
  accessorClass: 'Theme',
  generatorName: 'brushgen',
};

const ConfigFileSchema = z.object({
  inputPath: z.string().min(1),
  obsoleteTemplatePath: z.string().min(1),
  projectDir: z.string().min(1),
  themePrefix: z.string().min(1),
  ignoredBrushName: z.string().min(1),
  colorsNamespace: z.string().min(1),
  accessorNamespace: z.string().min(1),
  accessorClass: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
  generatorName: z.string().min(1),
}).strict().partial();

/**
 * Load brushgen configuration from brushgen.config.json in the repo root.
 * Falls back to defaults when the file is absent; a file that does not parse
 * or validate aborts the run.
 *
 * @param repoRoot - Directory searched for the config file
 */
export async function loadConfig(repoRoot: string, io: ResourceIO = fileResourceIO): Promise<BrushgenConfig> {
  const configPath = join(repoRoot, CONFIG_FILE_NAME);

  let text: string;
  try {
    text = await io.read(configPath);
  } catch (error) {
    if (isNotFound(error)) {
      log.debug(`No ${CONFIG_FILE_NAME} in ${repoRoot}, using defaults`);
      return { ...DEFAULT_CONFIG };
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = json5.parse(text);
  } catch (error) {
    throw new InvalidConfigError(
      configPath,
      error instanceof Error ? error.message : String(error),
      { cause: error }
    );
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : result.error.message;
    throw new InvalidConfigError(configPath, detail, { cause: result.error });
  }

  log.debug(`Loaded ${configPath}`);
  return { ...DEFAULT_CONFIG, ...result.data };
}

export interface OutputPaths {
  themes: Record<ThemeKey, string>;
  obsoleteBrushes: string;
  themeClass: string;
}

/**
 * Absolute paths of every generated document
 */
export function resolveOutputPaths(config: BrushgenConfig, repoRoot: string): OutputPaths {
  const projectDir = resolve(repoRoot, config.projectDir);
  const themesDir = join(projectDir, 'Themes');
  const themeFile = (theme: ThemeKey) => join(themesDir, `${config.themePrefix}.${themeDisplayName(theme)}.xaml`);

  return {
    themes: {
      light: themeFile('light'),
      dark: themeFile('dark'),
    },
    obsoleteBrushes: join(themesDir, `${config.themePrefix}.ObsoleteBrushes.xaml`),
    themeClass: join(projectDir, 'Theme.g.cs'),
  };
}
