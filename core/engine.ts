/**
 * Engine wiring
 *
 * Builds the parser, resolvers and sources for one configuration.
 */

import { IndexParser } from './apkindex'
import { RecipeTree } from './aports'
import type { ApkdepsConfig } from './config'
import { DependencyResolver, type InstalledSource, type RecipeSource } from './depends'
import { archForEnvironment, InstalledPackages } from './installed'
import { createLogger, type Logger } from './log'
import { ProviderResolver, type IndexLocator } from './provider'
import { RepositoryIndexes } from './repo'

export interface Engine {
  config: ApkdepsConfig
  logger: Logger
  parser: IndexParser
  recipes: RecipeSource
  installed: InstalledSource
  providers: ProviderResolver
  depends: DependencyResolver
}

/**
 * Replacements for the filesystem-backed defaults
 */
export interface EngineOptions {
  logger?: Logger
  parser?: IndexParser
  locator?: IndexLocator
  recipes?: RecipeSource
  installed?: InstalledSource
}

export function createEngine(config: ApkdepsConfig, options: EngineOptions = {}): Engine {
  const logger = options.logger ?? createLogger({ level: config.logLevel })
  const parser = options.parser ?? new IndexParser({ logger })
  const recipes = options.recipes ?? new RecipeTree({ root: config.aports, logger })
  const installed = options.installed ?? new InstalledPackages(config, parser)

  const providers = new ProviderResolver({
    parser,
    locator: options.locator ?? new RepositoryIndexes(config),
    nativeArch: config.nativeArch,
    logger,
  })

  const depends = new DependencyResolver({
    recipes,
    providers,
    installed,
    archFor: (environment) => archForEnvironment(config, environment),
    overrides: config.selectedProviders,
    logger,
  })

  return { config, logger, parser, recipes, installed, providers, depends }
}
