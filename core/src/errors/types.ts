/**
 * Shared error types for formtree.
 *
 * - P (Parser): form document loading
 * - S (Store): attribute store access and node materialization
 * - R (Runtime): tree structure problems found while resolving
 * - C (Config): environment configuration
 */

/**
 * Error categories.
 */
export type ErrorCategory = 'parser' | 'store' | 'runtime' | 'config';

/**
 * Location information for an error.
 */
export interface ErrorLocation {
  /** File path the document was read from */
  filePath?: string;
  /** Node id in the attribute store */
  nodeId?: string;
  /** Field name segments leading to the problem (e.g., ["person", "first"]) */
  fieldPath?: string[];
  /** Element context (e.g., "entry #2 of kids", "attribute 'Ff'") */
  context?: string;
}

/**
 * Base interface for all formtree errors.
 */
export interface FormTreeError extends Error {
  /** Unique error code (e.g., 'P001', 'S001', 'R001') */
  code: string;
  /** Error category for routing and display */
  category: ErrorCategory;
  /** Location information */
  location?: ErrorLocation;
  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Type guard to check if an error is a FormTreeError.
 */
export function isFormTreeError(error: unknown): error is FormTreeError {
  return (
    error instanceof Error &&
    'code' in error &&
    'category' in error &&
    typeof error.code === 'string' &&
    typeof error.category === 'string'
  );
}

/**
 * Store errors are the I/O kind: the backing node could not be read as the
 * tree expected.
 */
export function isStoreError(error: unknown): error is FormTreeError {
  return isFormTreeError(error) && error.category === 'store';
}
