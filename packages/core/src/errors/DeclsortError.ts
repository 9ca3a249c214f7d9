/**
 * DeclsortError - error hierarchy for declsort
 *
 * All errors extend the native Error class so they can travel through
 * plain `Error[]` result lists and `catch` clauses unchanged.
 *
 * Error types:
 * - ConfigError: configuration parsing/validation errors (fatal)
 * - FileAccessError: unreadable/unwritable files, failed backups (error)
 * - LanguageError: unsupported file type, unparseable syntax (warning)
 * - MissingPositionError: extracted comments whose node vanished (error)
 * - FormatError: reassembled output no longer parses (error)
 */

import type { NodeIdentity } from '@declsort/types';
import { identityLabel } from '@declsort/types';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  stage?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of DeclsortError
 */
export interface DeclsortErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all declsort errors.
 */
export abstract class DeclsortError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // instanceof must keep working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): DeclsortErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - unreadable YAML, wrong field types
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends DeclsortError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - unreadable or unwritable files, failed backups
 *
 * Severity: error
 * Codes: ERR_FILE_UNREADABLE, ERR_FILE_UNWRITABLE, ERR_BACKUP_FAILED
 */
export class FileAccessError extends DeclsortError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Language error - unsupported file type, unparseable syntax
 *
 * Severity: warning (the file is skipped, the batch continues)
 * Codes: ERR_UNSUPPORTED_LANG, ERR_PARSE_FAILURE
 */
export class LanguageError extends DeclsortError {
  readonly code: string;
  readonly severity = 'warning' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Comments were extracted for nodes that cannot be found in the
 * regenerated text. Reported once per file with every missing identity;
 * nothing is written for that file.
 *
 * Severity: error
 * Codes: ERR_MISSING_POSITION
 */
export class MissingPositionError extends DeclsortError {
  readonly code = 'ERR_MISSING_POSITION';
  readonly severity = 'error' as const;
  readonly identities: readonly NodeIdentity[];

  constructor(identities: readonly NodeIdentity[], context: ErrorContext = {}) {
    const labels = identities.map(identityLabel);
    super(
      `No position recovered for ${identities.length} node(s) with comments: ${labels.join(', ')}`,
      { ...context, identities: [...identities] },
      'Report this file; reorganization must keep every commented node recognizable'
    );
    this.identities = identities;
  }
}

/**
 * The reassembled text is not valid source anymore.
 *
 * Severity: error
 * Codes: ERR_OUTPUT_INVALID
 */
export class FormatError extends DeclsortError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
