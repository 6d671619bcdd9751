/**
 * Error code constants for formtree.
 *
 * Code format: {Category}{Number}
 * - P: Parser errors (P001-P099)
 * - S: Store errors (S001-S099)
 * - R: Runtime errors (R001-R099)
 * - C: Configuration errors (C001-C099)
 */

// =============================================================================
// Parser Error Codes (P001-P099)
// =============================================================================

export const ParserErrorCode = {
  INVALID_YAML_DOCUMENT: 'P001',
  INVALID_FIELDS_SECTION: 'P002',
  INVALID_FIELD_ENTRY: 'P003',
  INVALID_ATTRIBUTE_VALUE: 'P004',
  DUPLICATE_NODE_ID: 'P005',
} as const;

export type ParserErrorCodeValue = (typeof ParserErrorCode)[keyof typeof ParserErrorCode];

// =============================================================================
// Store Error Codes (S001-S099)
// =============================================================================

export const StoreErrorCode = {
  // S001-S009: Value access
  UNEXPECTED_VALUE_KIND: 'S001',
  MALFORMED_ARRAY_ENTRY: 'S002',

  // S010-S019: Node lifecycle
  DUPLICATE_NODE_ID: 'S010',
  FOREIGN_NODE: 'S011',
  INDEX_OUT_OF_RANGE: 'S012',
} as const;

export type StoreErrorCodeValue = (typeof StoreErrorCode)[keyof typeof StoreErrorCode];

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  PARENT_CYCLE: 'R001',
  INVALID_PATH_INDEX: 'R002',
  KID_NOT_IN_BACKING_ARRAY: 'R003',
  KID_INDEX_OUT_OF_RANGE: 'R004',
} as const;

export type RuntimeErrorCodeValue = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

// =============================================================================
// Configuration Error Codes (C001-C099)
// =============================================================================

export const ConfigErrorCode = {
  INVALID_LOG_LEVEL: 'C001',
  INVALID_PARENT_CYCLE_POLICY: 'C002',
} as const;

export type ConfigErrorCodeValue = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

// =============================================================================
// Combined Types
// =============================================================================

/**
 * All error codes in the system.
 */
export type ErrorCode =
  | ParserErrorCodeValue
  | StoreErrorCodeValue
  | RuntimeErrorCodeValue
  | ConfigErrorCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  P: 'parser',
  S: 'store',
  R: 'runtime',
  C: 'config',
} as const;

type ErrorCodePrefix = keyof typeof ERROR_CODE_CATEGORIES;

function isErrorCodePrefix(value: string): value is ErrorCodePrefix {
  return value in ERROR_CODE_CATEGORIES;
}

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): 'parser' | 'store' | 'runtime' | 'config' {
  const prefix = code.charAt(0);
  return isErrorCodePrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'runtime';
}
