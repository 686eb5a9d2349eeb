/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface PyscanErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly line?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up the definition, renders its message template with `context` and
 * wraps both in a PyscanError.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("PYSCAN-C003", { path: "missing.py" })
 * // PyscanError: "File not found: missing.py"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  line?: number | undefined
): PyscanError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new PyscanError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    line,
    context,
  });
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all pyscan errors.
 * Provides structured data for host applications to format as needed.
 */
export class PyscanError extends Error {
  readonly errorId: string;
  readonly line?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: PyscanErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const lineStr = data.line !== undefined ? ` at line ${data.line}` : '';
    super(`${data.message}${lineStr}`);
    this.name = 'PyscanError';
    this.errorId = data.errorId;
    this.line = data.line;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): PyscanErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at line \d+$/, ''),
      line: this.line,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: PyscanErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Command-line usage, configuration and input errors */
export class CliError extends PyscanError {
  constructor(errorId: string, context: Record<string, unknown>) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    if (definition.category !== 'cli') {
      throw new TypeError(`Expected cli error ID, got: ${errorId}`);
    }

    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      context,
    });
    this.name = 'CliError';
  }
}

/**
 * Thrown when the indent stack loses its base level. Not a diagnostic for
 * the source text: the lexer state itself is corrupt.
 */
export class IndentationInvariantError extends Error {
  constructor(message = 'Indentation stack is empty') {
    super(message);
    this.name = 'IndentationInvariantError';
  }
}
