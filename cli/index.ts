/**
 * CLI for apkdeps
 *
 * Commands:
 * - compare <a> <b>         compare two versions
 * - validate <versions...>  check versions
 * - index <path>            show an index view
 * - providers <name>        list or pick providers
 * - depends <names...>      resolve dependencies
 * - package <name>          find a package in recipes or indexes
 */

import cac, { type CAC } from 'cac'
import { checkArches } from '../core/aports'
import { compare, validate } from '../core/version'
import { resolveConfig, type ApkdepsConfig, type ConfigOverrides } from '../core/config'
import { createEngine, type Engine } from '../core/engine'
import { ConfigError, PackageNotFoundError } from '../core/errors'
import { createLogger, isLogLevel, type Logger } from '../core/log'
import type { CLIContext, CommandResult } from './types'
import { VERSION } from './version'
import {
  formatDepends,
  formatError,
  formatInstalledIndex,
  formatPackageInfo,
  formatProviderIndex,
  formatProviders,
  formatRecord,
  missingArgumentError,
  unknownCommandError,
} from './utils'
import { mainHelp, getCommandHelp } from './help'

export type { CLIContext, CommandResult } from './types'

type Options = Record<string, unknown>

/**
 * CLI instance type
 */
export interface CLIInstance {
  name: string
  parse: (argv?: string[], options?: { run?: boolean }) => { args: readonly string[]; options: Record<string, unknown> }
  commands: string[]
  cli: CAC
}

/**
 * Create and return the CLI instance with all commands registered
 */
export function createCLI(): CLIInstance {
  const cli = cac('apkdeps')

  cli.version(VERSION)
  cli.help()

  cli.option('--work <dir>', 'Work directory')
  cli.option('--aports <dir>', 'Recipe tree')
  cli.option('--log-level <level>', 'Log level')

  cli.command('compare <a> <b>', 'compare two versions')
    .option('--fuzzy', 'Treat versions differing only in length as equal')
    .action(() => {})

  cli.command('validate <versions...>', 'check that versions are valid')
    .action(() => {})

  cli.command('index <path>', 'show the packages of an APKINDEX')
    .option('--installed', 'Read as installed database')
    .option('--json', 'Output as JSON')
    .action(() => {})

  cli.command('providers <name>', 'list the packages providing a name')
    .option('--arch <arch>', 'Architecture of the indexes')
    .option('--index <path>', 'Index to search, repeatable')
    .option('--pick', 'Print only the chosen provider')
    .option('--json', 'Output as JSON')
    .action(() => {})

  cli.command('depends <names...>', 'resolve the dependencies of packages')
    .option('--env <environment>', 'Environment to resolve for')
    .option('--json', 'Output as JSON')
    .action(() => {})

  cli.command('package <name>', 'find a package in the recipe tree or the indexes')
    .option('--arch <arch>', 'Preferred architecture')
    .option('--json', 'Output as JSON')
    .action(() => {})

  return {
    name: 'apkdeps',
    parse: cli.parse.bind(cli),
    commands: ['compare', 'validate', 'index', 'providers', 'depends', 'package'],
    cli
  }
}

function stringOption(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

function listOption(value: unknown): string[] {
  if (Array.isArray(value)) return value.map((v) => String(v))
  const single = stringOption(value)
  return single === undefined ? [] : [single]
}

function configFromOptions(options: Options, env: NodeJS.ProcessEnv): ApkdepsConfig {
  const overrides: ConfigOverrides = {}
  const work = stringOption(options.work)
  if (work) overrides.work = work
  const aports = stringOption(options.aports)
  if (aports) overrides.aports = aports

  const logLevel = stringOption(options.logLevel)
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(`Invalid log level '${logLevel}'`, 'logLevel')
    }
    overrides.logLevel = logLevel
  }

  return resolveConfig(overrides, env)
}

/**
 * Execute a CLI command with the given arguments and context
 */
export async function runCLI(args: string[], context: CLIContext): Promise<CommandResult> {
  const { stdout, stderr } = context

  // Handle --version and -v at root level
  if (args.length === 1 && (args[0] === '--version' || args[0] === '-v')) {
    stdout(VERSION)
    return { exitCode: 0 }
  }

  // Handle --help and -h at root level
  if (args.length === 0 || (args.length === 1 && (args[0] === '--help' || args[0] === '-h'))) {
    stdout(mainHelp())
    return { exitCode: 0 }
  }

  const command = args[0] ?? ''
  const restArgs = args.slice(1)

  // Handle command-specific help
  if (restArgs.includes('--help') || restArgs.includes('-h')) {
    const helpText = getCommandHelp(command)
    if (helpText) {
      stdout(helpText)
      return { exitCode: 0 }
    }
  }

  const { cli, commands } = createCLI()
  if (!commands.includes(command)) {
    stderr(unknownCommandError(command))
    return { exitCode: 1, error: `unknown command '${command}'` }
  }

  try {
    const parsed = cli.parse(['', '', ...args], { run: false })
    const positional = [...parsed.args]
    const options: Options = parsed.options

    const config = configFromOptions(options, context.env ?? process.env)
    const logger = createLogger({ level: config.logLevel, sink: (_level, line) => stderr(line) })
    const engine = (): Engine => (context.createEngine ?? defaultEngine)(config, logger)

    switch (command) {
      case 'compare':
        return executeCompare(positional, options, context)
      case 'validate':
        return executeValidate(positional, context)
      case 'index':
        return executeIndex(positional, options, context, engine)
      case 'providers':
        return executeProviders(positional, options, context, engine)
      case 'package':
        return executePackage(positional, options, context, engine)
      default:
        return executeDepends(positional, options, context, engine)
    }
  } catch (err: unknown) {
    const message = formatError(command, err)
    stderr(message)
    return { exitCode: 1, error: message }
  }
}

function defaultEngine(config: ApkdepsConfig, logger: Logger): Engine {
  return createEngine(config, { logger })
}

function emit(context: CLIContext, output: string): CommandResult {
  context.stdout(output)
  return { exitCode: 0, output }
}

/**
 * Execute compare command
 */
function executeCompare(args: string[], options: Options, context: CLIContext): CommandResult {
  const [a, b] = args
  if (a === undefined || b === undefined) {
    context.stderr(missingArgumentError('compare', 'version'))
    return { exitCode: 1, error: 'missing version argument' }
  }
  return emit(context, String(compare(a, b, options.fuzzy === true)))
}

/**
 * Execute validate command
 */
function executeValidate(args: string[], context: CLIContext): CommandResult {
  if (args.length === 0) {
    context.stderr(missingArgumentError('validate', 'version'))
    return { exitCode: 1, error: 'missing version argument' }
  }

  const invalid = args.filter((v) => !validate(v))
  const output = args.map((v) => `${v}: ${invalid.includes(v) ? 'invalid' : 'valid'}`).join('\n')
  context.stdout(output)

  if (invalid.length > 0) {
    return { exitCode: 1, output, error: `invalid version: ${invalid.join(', ')}` }
  }
  return { exitCode: 0, output }
}

/**
 * Execute index command
 */
function executeIndex(args: string[], options: Options, context: CLIContext, engine: () => Engine): CommandResult {
  const path = args[0]
  if (!path) {
    context.stderr(missingArgumentError('index', 'path'))
    return { exitCode: 1, error: 'missing path argument' }
  }

  const json = options.json === true
  const { parser } = engine()
  if (options.installed === true) {
    return emit(context, formatInstalledIndex(parser.parse(path, false), { json }))
  }
  return emit(context, formatProviderIndex(parser.parse(path, true), { json }))
}

/**
 * Execute providers command
 */
function executeProviders(args: string[], options: Options, context: CLIContext, engine: () => Engine): CommandResult {
  const name = args[0]
  if (!name) {
    context.stderr(missingArgumentError('providers', 'name'))
    return { exitCode: 1, error: 'missing name argument' }
  }

  const { providers, config } = engine()
  const indexes = listOption(options.index)
  const arch = stringOption(options.arch)

  if (options.pick === true) {
    const picked = providers.resolveOne(name, { indexes, arch, overrides: config.selectedProviders })
    if (!picked) {
      throw new PackageNotFoundError(name, indexes)
    }
    return emit(context, options.json === true ? JSON.stringify(picked, null, 2) : formatRecord(picked))
  }

  const found = providers.providers(name, { indexes, arch, mustExist: true })
  return emit(context, formatProviders(found, { json: options.json === true }))
}

/**
 * Execute depends command
 */
function executeDepends(args: string[], options: Options, context: CLIContext, engine: () => Engine): CommandResult {
  if (args.length === 0) {
    context.stderr(missingArgumentError('depends', 'package'))
    return { exitCode: 1, error: 'missing package argument' }
  }

  const environment = stringOption(options.env) ?? 'native'
  const names = engine().depends.recurse(args, environment)
  return emit(context, formatDepends(names, { json: options.json === true }))
}

/**
 * Execute package command
 */
function executePackage(args: string[], options: Options, context: CLIContext, engine: () => Engine): CommandResult {
  const name = args[0]
  if (!name) {
    context.stderr(missingArgumentError('package', 'name'))
    return { exitCode: 1, error: 'missing name argument' }
  }

  const { depends, config } = engine()
  const arch = stringOption(options.arch) ?? config.nativeArch
  const info = depends.packageGet(name, arch)
  if (!info) {
    throw new PackageNotFoundError(name)
  }

  const output = formatPackageInfo(info, { json: options.json === true })
  context.stdout(output)
  if (!checkArches(info.arch, arch)) {
    context.stderr(`apkdeps package: ${name} is not available for ${arch}`)
    return { exitCode: 1, output, error: `not available for ${arch}` }
  }
  return { exitCode: 0, output }
}
