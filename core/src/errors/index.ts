/**
 * formtree error system
 *
 * - P (Parser): form document loading
 * - S (Store): attribute store access and node materialization
 * - R (Runtime): tree structure problems
 * - C (Config): environment configuration
 */

// Types
export type { ErrorCategory, ErrorLocation, FormTreeError } from './types.js';
export { isFormTreeError, isStoreError } from './types.js';

// Error Codes
export {
  ParserErrorCode,
  StoreErrorCode,
  RuntimeErrorCode,
  ConfigErrorCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
} from './codes.js';
export type {
  ParserErrorCodeValue,
  StoreErrorCodeValue,
  RuntimeErrorCodeValue,
  ConfigErrorCodeValue,
  ErrorCode,
} from './codes.js';

// Helpers
export type { CreateErrorOptions } from './helpers.js';
export {
  createFormTreeError,
  createParserError,
  createStoreError,
  createRuntimeError,
  createConfigError,
  formatError,
} from './helpers.js';
