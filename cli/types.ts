/**
 * CLI Types for apkdeps
 */

import type { ApkdepsConfig } from '../core/config'
import type { Engine } from '../core/engine'
import type { Logger } from '../core/log'

/**
 * Result of executing a CLI command
 */
export interface CommandResult {
  exitCode: number
  output?: string
  error?: string
}

/**
 * CLI context for dependency injection
 */
export interface CLIContext {
  stdout: (text: string) => void
  stderr: (text: string) => void
  /** Environment read for APKDEPS_* settings; defaults to process.env */
  env?: NodeJS.ProcessEnv
  /** Builds the engine for the resolved configuration */
  createEngine?: (config: ApkdepsConfig, logger: Logger) => Engine
}

/**
 * Output format options
 */
export interface FormatOptions {
  json?: boolean
}
