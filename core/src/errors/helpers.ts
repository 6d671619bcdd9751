/**
 * Error creation helpers.
 *
 * Provides factory functions for creating structured errors with
 * consistent formatting across all error categories.
 */

import type { ErrorLocation, FormTreeError } from './types.js';
import { getErrorCategory } from './codes.js';

/**
 * Options for creating a formtree error.
 */
export interface CreateErrorOptions {
  /** Error code (e.g., 'P001', 'S001') */
  code: string;
  /** Error message */
  message: string;
  /** Location information */
  location?: ErrorLocation;
  /** Suggested fix */
  suggestion?: string;
  /** Original error that caused this error */
  cause?: unknown;
}

/**
 * Creates a FormTreeError with the given options.
 *
 * The category is inferred from the error code.
 */
export function createFormTreeError(options: CreateErrorOptions): FormTreeError {
  const { code, message, location, suggestion, cause } = options;

  return Object.assign(new Error(message, { cause }), {
    name: 'FormTreeError',
    code,
    category: getErrorCategory(code),
    location,
    suggestion,
  });
}

/**
 * Creates a parser error (P-code).
 */
export function createParserError(
  code: string,
  message: string,
  options: {
    filePath?: string;
    fieldPath?: string[];
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): FormTreeError {
  return createFormTreeError({
    code,
    message,
    location: {
      filePath: options.filePath,
      fieldPath: options.fieldPath,
      context: options.context,
    },
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

/**
 * Creates a store error (S-code).
 */
export function createStoreError(
  code: string,
  message: string,
  options: {
    nodeId?: string;
    context?: string;
    cause?: unknown;
  } = {},
): FormTreeError {
  return createFormTreeError({
    code,
    message,
    location: {
      nodeId: options.nodeId,
      context: options.context,
    },
    cause: options.cause,
  });
}

/**
 * Creates a runtime error (R-code).
 */
export function createRuntimeError(
  code: string,
  message: string,
  options: {
    nodeId?: string;
    fieldPath?: string[];
    context?: string;
    suggestion?: string;
  } = {},
): FormTreeError {
  return createFormTreeError({
    code,
    message,
    location: {
      nodeId: options.nodeId,
      fieldPath: options.fieldPath,
      context: options.context,
    },
    suggestion: options.suggestion,
  });
}

/**
 * Creates a configuration error (C-code).
 */
export function createConfigError(
  code: string,
  message: string,
  options: { context?: string; suggestion?: string } = {},
): FormTreeError {
  return createFormTreeError({
    code,
    message,
    location: options.context ? { context: options.context } : undefined,
    suggestion: options.suggestion,
  });
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Formats a FormTreeError for display.
 */
export function formatError(error: FormTreeError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);

  if (error.location) {
    const loc = error.location;
    if (loc.filePath) {
      parts.push(`  File: ${loc.filePath}`);
    }
    if (loc.nodeId) {
      parts.push(`  Node: ${loc.nodeId}`);
    }
    if (loc.fieldPath && loc.fieldPath.length > 0) {
      parts.push(`  Path: ${loc.fieldPath.join(' > ')}`);
    }
    if (loc.context) {
      parts.push(`  Context: ${loc.context}`);
    }
  }

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}
