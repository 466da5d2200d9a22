/**
 * Error types raised by the generator. Every failure aborts the run; the
 * `code` lets the CLI and tests tell the cases apart without string matching.
 */

export type BrushgenErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'INVALID_INPUT'
  | 'MALFORMED_NAME'
  | 'UNKNOWN_THEME'
  | 'REPO_ROOT_NOT_FOUND'
  | 'TEMPLATE_MARKER_MISSING'
  | 'INVALID_CONFIG';

export class BrushgenError extends Error {
  readonly code: BrushgenErrorCode;

  constructor(code: BrushgenErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class BrushInputNotFoundError extends BrushgenError {
  constructor(readonly path: string) {
    super('INPUT_NOT_FOUND', `Brush input file not found: ${path}`);
  }
}

export class InvalidBrushInputError extends BrushgenError {
  constructor(
    readonly source: string,
    detail: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super('INVALID_INPUT', `Invalid brush input in ${source}: ${detail}`, options);
  }
}

export class MalformedBrushNameError extends BrushgenError {
  constructor(readonly brushName: string) {
    super(
      'MALFORMED_NAME',
      `Brush name "${brushName}" must have at least 3 dot-separated segments (namespace, category, name)`
    );
  }
}

export class UnknownThemeError extends BrushgenError {
  constructor(readonly theme: string) {
    super('UNKNOWN_THEME', `Unknown theme: ${theme}`);
  }
}

export class RepoRootNotFoundError extends BrushgenError {
  constructor(readonly startDir: string) {
    super('REPO_ROOT_NOT_FOUND', `Failed to find the repo root (no .git directory above ${startDir})`);
  }
}

export class TemplateMarkerError extends BrushgenError {
  constructor(readonly marker: string) {
    super('TEMPLATE_MARKER_MISSING', `Obsolete brushes template has no line matching ${marker}`);
  }
}

export class InvalidConfigError extends BrushgenError {
  constructor(readonly path: string, detail: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', `Invalid configuration in ${path}: ${detail}`, options);
  }
}
