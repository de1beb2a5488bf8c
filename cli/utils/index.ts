/**
 * CLI utilities - barrel export
 */

export { formatRecord, formatProviders, formatProviderIndex, formatInstalledIndex, formatDepends, formatPackageInfo } from './format'
export { formatError, missingArgumentError, unknownCommandError, getErrorMessage } from './errors'
