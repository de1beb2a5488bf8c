/**
 * Error formatting utilities for CLI
 */

import { isApkError } from '../../core/errors'

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return String(err)
}

/**
 * Format error for CLI output
 *
 * Format: apkdeps <command>: <message>, with the error code for
 * structured errors
 */
export function formatError(command: string, err: unknown): string {
  const message = getErrorMessage(err)
  const code = isApkError(err) ? ` (${err.code})` : ''
  return `apkdeps ${command}: ${message}${code}`
}

/**
 * Create a missing argument error message
 */
export function missingArgumentError(command: string, argName: string): string {
  return `apkdeps ${command}: missing ${argName} argument`
}

/**
 * Create an unknown command error message
 */
export function unknownCommandError(command: string): string {
  return `apkdeps: unknown command '${command}'`
}
