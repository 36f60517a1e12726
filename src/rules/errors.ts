/**
 * Errors raised while loading rule documents.
 *
 * MalformedConfigError and SourceUnavailableError are recoverable: the
 * resolver logs them and moves on to the next candidate. EmbeddedRulesError
 * means the built-in defaults are broken and ends the run.
 */

export class MalformedConfigError extends Error {
  readonly origin: string;
  readonly reason: string;

  constructor(origin: string, reason: string, options?: { cause?: unknown }) {
    super(`Malformed rules in ${origin}: ${reason}`, options);
    this.name = 'MalformedConfigError';
    this.origin = origin;
    this.reason = reason;
  }
}

export class SourceUnavailableError extends Error {
  readonly path: string;
  /** True when the file does not exist (as opposed to being unreadable). */
  readonly missing: boolean;

  constructor(path: string, cause: unknown) {
    const code =
      cause instanceof Error && 'code' in cause
        ? (cause as NodeJS.ErrnoException).code
        : undefined;
    const detail = code === 'ENOENT'
      ? 'file not found'
      : cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read rules file ${path}: ${detail}`, { cause });
    this.name = 'SourceUnavailableError';
    this.path = path;
    this.missing = code === 'ENOENT';
  }
}

export class EmbeddedRulesError extends Error {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Built-in default rules are invalid: ${detail}`, { cause });
    this.name = 'EmbeddedRulesError';
  }
}
