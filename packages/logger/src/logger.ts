import debug from 'debug';
import chalk from 'chalk';
import { log as clackLog } from '@clack/prompts';

/**
 * Main namespace for all brushgen logging
 */
const NAMESPACE = 'brushgen';

/**
 * Logger interface providing contextualized logging methods
 */
export interface Logger {
  /** Debug-level logging (gray) - for detailed troubleshooting */
  debug: (...args: unknown[]) => void;
  /** Error-level logging (red) - for errors */
  error: (...args: unknown[]) => void;
  /** Success-level logging (green) - for success messages */
  success: (...args: unknown[]) => void;
}

/**
 * Join log arguments into a single line. Objects are pretty-printed, errors
 * contribute their message.
 */
export function formatArgs(args: unknown[]): string {
  return args.map(arg => {
    if (arg instanceof Error) {
      return arg.message;
    }
    return typeof arg === 'object' && arg !== null ? JSON.stringify(arg, null, 2) : String(arg);
  }).join(' ');
}

/**
 * Creates a contextualized logger instance
 *
 * @param context - The context/module name (e.g., 'cli', 'generate', 'source')
 * @param useClack - Whether to also output to @clack/prompts for user-facing messages
 * @returns A Logger instance with contextualized debug namespace
 */
export function createLogger(context: string, useClack: boolean = false): Logger {
  const namespace = `${NAMESPACE}:${context}`;
  const debugLogger = debug(namespace);

  return {
    debug: (...args) => {
      const message = formatArgs(args);
      debugLogger(chalk.gray(message));
    },
    error: (...args) => {
      const message = formatArgs(args);
      if (useClack) {
        clackLog.error(message);
      } else {
        debugLogger(chalk.red(message));
      }
    },
    success: (...args) => {
      const message = formatArgs(args);
      if (useClack) {
        clackLog.success(message);
      } else {
        debugLogger(chalk.green(message));
      }
    }
  };
}

/**
 * Pre-configured logger instances for common contexts
 *
 * Enable all logs: DEBUG=brushgen:* npm run generate
 * Enable specific context: DEBUG=brushgen:generate npm run generate
 */
export const logger = {
  /** CLI-specific logging with clack integration */
  cli: createLogger('cli', true),

  /** Pipeline orchestration */
  generate: createLogger('generate'),

  /** Input loading and validation */
  source: createLogger('source'),

  /** Configuration loading */
  config: createLogger('config'),

  /** Repository root discovery */
  projectRoot: createLogger('project-root'),

  /** Document emitters */
  emit: createLogger('emit'),

  /** File reads and writes */
  io: createLogger('io')
};

