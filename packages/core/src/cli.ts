#!/usr/bin/env tsx
import { Command } from 'commander';
import { intro, outro } from '@clack/prompts';
import chalk from 'chalk';
import { relative } from 'node:path';
import { logger } from '@brushgen/logger';
import { generateBrushes } from './generate.js';
import { BrushgenError } from './errors.js';

const log = logger.cli;

const program = new Command();

program
  .name('brushgen')
  .description('Regenerate theme dictionaries, obsolete brush aliases and the Theme accessor class from ThemeColors.json')
  .version('1.0.0')
  .action(async () => {
    intro(chalk.bgBlue(' brushgen '));
    try {
      const result = await generateBrushes();

      for (const path of result.written) {
        log.success(`Wrote ${relative(result.repoRoot, path)}`);
      }
      outro(
        `${result.brushCount} brushes, ${result.classCount} classes, ` +
        `${result.obsoleteAliasCount} obsolete aliases`
      );
    } catch (error) {
      const code = error instanceof BrushgenError ? ` [${error.code}]` : '';
      log.error(chalk.red(`Failed to generate brushes${code}:`));
      log.error(chalk.red(`   ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  });

await program.parseAsync();
