/**
 * Scanline — Error Taxonomy
 *
 * Every error carries the pipeline stage that raised it so the run
 * summary can report where a fatal failure happened.
 */

export type PipelineStage =
  | 'config'
  | 'promotion'
  | 'history-index'
  | 'fetch'
  | 'dedup'
  | 'synthesis'
  | 'write';

export abstract class ScanlineError extends Error {
  abstract readonly stage: PipelineStage;
  /** Fatal errors abort the run; the rest are recorded and skipped. */
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The note corpus could not be listed. Indexing an empty corpus would
 * resurface every previously written item, so the run stops here.
 */
export class CorpusUnavailableError extends ScanlineError {
  readonly stage = 'history-index';
  readonly fatal = true;

  constructor(
    readonly location: string,
    options?: { cause?: unknown }
  ) {
    super(`Corpus unavailable at ${location}`, options);
  }
}

export class FetchFailureError extends ScanlineError {
  readonly stage = 'fetch';
  readonly fatal = false;

  constructor(
    readonly track: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${track}: ${message}`, options);
  }
}

export class RewriteConflictError extends ScanlineError {
  readonly stage = 'promotion';
  readonly fatal = false;

  constructor(
    readonly notePath: string,
    readonly lineNumber: number,
    reason: string
  ) {
    super(`Could not rewrite ${notePath}:${lineNumber + 1} (${reason})`);
  }
}

export class ConfigValidationError extends ScanlineError {
  readonly stage = 'config';
  readonly fatal = true;

  constructor(readonly issues: string[]) {
    super(`Invalid pipeline configuration:\n  - ${issues.join('\n  - ')}`);
  }
}

export function isScanlineError(error: unknown): error is ScanlineError {
  return error instanceof ScanlineError;
}
