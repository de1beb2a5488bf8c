/**
 * Help text for CLI commands
 */

import { VERSION } from './version'

const GLOBAL_OPTIONS = `  --work <dir>         Work directory (APKDEPS_WORK)
  --aports <dir>       Recipe tree (APKDEPS_APORTS)
  --log-level <level>  verbose, debug, info, warn, error or silent
  -h, --help           Display this message`

/**
 * Main help text shown with --help or no arguments
 */
export function mainHelp(): string {
  return `apkdeps/${VERSION}

Usage:
  $ apkdeps <command> [options]

Commands:
  compare <a> <b>        compare two versions (-1, 0 or 1)
  validate <versions...> check that versions are valid
  index <path>           show the packages of an APKINDEX
  providers <name>       list the packages providing a name
  depends <names...>     resolve the dependencies of packages
  package <name>         find a package in the recipe tree or the indexes

For more info, run any command with the --help flag:
  $ apkdeps providers --help
  $ apkdeps depends --help

Options:
  -v, --version  Display version number
  -h, --help     Display this message
`
}

export function compareHelp(): string {
  return `apkdeps/${VERSION}

Usage:
  $ apkdeps compare <a> <b>

Prints -1 when a is lower, 0 when equal, 1 when a is higher.

Options:
  --fuzzy              Treat versions differing only in length as equal
${GLOBAL_OPTIONS}
`
}

export function validateHelp(): string {
  return `apkdeps/${VERSION}

Usage:
  $ apkdeps validate <versions...>

Exits with 1 when any version is invalid.

Options:
${GLOBAL_OPTIONS}
`
}

export function indexHelp(): string {
  return `apkdeps/${VERSION}

Usage:
  $ apkdeps index <path>

Options:
  --installed          Read as installed database (one provider per name)
  --json               Output as JSON
${GLOBAL_OPTIONS}
`
}

export function providersHelp(): string {
  return `apkdeps/${VERSION}

Usage:
  $ apkdeps providers <name>

Options:
  --arch <arch>        Architecture of the indexes (default: native)
  --index <path>       Index to search, repeatable (default: configured repositories)
  --pick               Print only the provider that would be chosen
  --json               Output as JSON
${GLOBAL_OPTIONS}
`
}

export function dependsHelp(): string {
  return `apkdeps/${VERSION}

Usage:
  $ apkdeps depends <names...>

Names prefixed with "!" are conflicts.

Options:
  --env <environment>  Environment to resolve for (default: native)
  --json               Output as JSON
${GLOBAL_OPTIONS}
`
}

export function packageHelp(): string {
  return `apkdeps/${VERSION}

Usage:
  $ apkdeps package <name>

Looks in the recipe tree, then the indexes of the architecture, then the
indexes of the other architectures. Exits with 1 when the package found
is not available for the architecture.

Options:
  --arch <arch>        Preferred architecture (default: native)
  --json               Output as JSON
${GLOBAL_OPTIONS}
`
}

/**
 * Get help text for a specific command
 */
export function getCommandHelp(command: string): string | null {
  switch (command) {
    case 'compare':
      return compareHelp()
    case 'validate':
      return validateHelp()
    case 'index':
      return indexHelp()
    case 'providers':
      return providersHelp()
    case 'depends':
      return dependsHelp()
    case 'package':
      return packageHelp()
    default:
      return null
  }
}
