/**
 * Package Metadata Error Types
 *
 * Structured error types for index parsing and dependency resolution with:
 * - Typed error codes for programmatic handling
 * - Context pointing at the offending file, block or package
 * - JSON serialization for CLI output
 */

// =============================================================================
// Error Code Types
// =============================================================================

/**
 * Error codes for metadata operations
 */
export type ApkErrorCode =
  | 'EPARSE'         // Malformed index, recipe or version string
  | 'ENOTFOUND'      // No index provides the package
  | 'ERESOLUTION'    // Dependency could not be resolved
  | 'EVALIDATION'    // Invalid input
  | 'ECONFIG'        // Invalid configuration

// =============================================================================
// Error Context Types
// =============================================================================

/**
 * Context for metadata errors
 */
export interface ApkErrorContext {
  package?: string
  path?: string
  block?: string
  requiredBy?: string[]
  cause?: string
}

/**
 * JSON-serializable error representation
 */
export interface ApkErrorJSON {
  name: string
  code: ApkErrorCode
  message: string
  context?: ApkErrorContext
  stack?: string
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for metadata operations
 */
export class ApkError extends Error {
  readonly code: ApkErrorCode
  readonly context?: ApkErrorContext

  constructor(
    code: ApkErrorCode,
    message: string,
    context?: ApkErrorContext
  ) {
    super(message)
    this.name = 'ApkError'
    this.code = code
    this.context = context

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for JSON output
   */
  toJSON(): ApkErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    }
  }

  /**
   * Create ApkError from JSON representation
   */
  static fromJSON(json: ApkErrorJSON): ApkError {
    const error = new ApkError(json.code, json.message, json.context)
    if (json.stack) {
      error.stack = json.stack
    }
    return error
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Malformed index block, recipe or archive
 */
export class ParseError extends ApkError {
  constructor(message: string, context?: ApkErrorContext) {
    super('EPARSE', message, context)
    this.name = 'ParseError'
  }
}

/**
 * No index provides the requested package
 */
export class PackageNotFoundError extends ApkError {
  constructor(packageName: string, indexes?: string[]) {
    const message = indexes && indexes.length > 0
      ? `Could not find package '${packageName}' in: ${indexes.join(', ')}`
      : `Could not find package '${packageName}'`

    super('ENOTFOUND', message, { package: packageName })
    this.name = 'PackageNotFoundError'
  }
}

/**
 * Dependency missing from both the recipe tree and the binary indexes
 */
export class ResolutionError extends ApkError {
  constructor(message: string, packageName?: string, requiredBy?: string[]) {
    super('ERESOLUTION', message, { package: packageName, requiredBy })
    this.name = 'ResolutionError'
  }
}

/**
 * Invalid input or data validation failed
 */
export class ValidationError extends ApkError {
  constructor(message: string, context?: ApkErrorContext) {
    super('EVALIDATION', message, context)
    this.name = 'ValidationError'
  }
}

/**
 * Invalid configuration value
 */
export class ConfigError extends ApkError {
  readonly key?: string

  constructor(message: string, key?: string) {
    super('ECONFIG', message)
    this.name = 'ConfigError'
    this.key = key
  }
}

// =============================================================================
// Error Type Guards
// =============================================================================

/**
 * Check if an error is an ApkError
 */
export function isApkError(error: unknown): error is ApkError {
  return error instanceof ApkError
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: ApkErrorCode): boolean {
  return isApkError(error) && error.code === code
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Wrap an unknown error as an ApkError
 */
export function wrapError(error: unknown, code: ApkErrorCode = 'EVALIDATION'): ApkError {
  if (isApkError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new ApkError(code, error.message, { cause: error.message })
  }

  return new ApkError(code, String(error))
}
