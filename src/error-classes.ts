/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TemplateErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up error definition from registry, renders message template with context,
 * and creates TemplateError with structured metadata.
 *
 * @param errorId - Error identifier (format: TMPL-{category}{3-digit})
 * @param context - Key-value pairs for template placeholder replacement
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("TMPL-C001", { reason: "rules must be a mapping" })
 * // Creates TemplateError: "Invalid configuration: rules must be a mapping"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): TemplateError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new TemplateError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all template errors.
 * Provides structured data for host applications to format as needed.
 */
export class TemplateError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TemplateErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'TemplateError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TemplateErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TemplateErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Parse-time errors.
 * Message shape: `template: <tree>:<line>:<detail>`, where <tree> is the
 * innermost tree being parsed when the error was raised.
 */
export class ParseError extends TemplateError {
  readonly treeName: string;
  readonly line: number;
  /** Message without the `template: <tree>:<line>:` prefix */
  readonly detail: string;

  constructor(
    errorId: string,
    detail: string,
    treeName: string,
    line: number,
    location?: SourceLocation | undefined,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'parse') {
      throw new TypeError(`Expected parse error ID, got: ${errorId}`);
    }

    super({
      errorId,
      message: `template: ${treeName}:${line}:${detail}`,
      location,
      context,
    });
    this.name = 'ParseError';
    this.treeName = treeName;
    this.line = line;
    this.detail = detail;
  }
}
