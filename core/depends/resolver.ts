/**
 * Dependency Recursion Engine
 *
 * Expands requested names into the flat list of packages to install,
 * breadth first, over the local recipe tree and the binary indexes.
 */

import type { PackageRecord } from '../apkindex'
import { checkArches } from '../aports'
import { BUILD_DEVICE_ARCHES } from '../config'
import { PackageNotFoundError, ResolutionError, ValidationError } from '../errors'
import { silentLogger, type Logger } from '../log'
import type { ProviderResolver } from '../provider'
import { compare } from '../version'
import type {
  InstalledSource,
  NameSet,
  PackageInfo,
  RecipeSource,
  ResolvedPackage,
} from './types'

export interface DependencyResolverOptions {
  recipes: RecipeSource
  providers: ProviderResolver
  installed: InstalledSource
  /** Architecture of an environment */
  archFor: (environment: string) => string
  /** Explicit picks: capability -> provider pkgname */
  overrides?: Readonly<Record<string, string>>
  /**
   * Architectures {@link DependencyResolver.packageGet} falls back to
   * @default BUILD_DEVICE_ARCHES
   */
  buildArches?: readonly string[]
  logger?: Logger
}

function infoFromRecord(record: PackageRecord): PackageInfo {
  return {
    pkgname: record.pkgname,
    version: record.version,
    depends: [...record.depends],
    provides: [...record.provides],
    arch: [record.arch],
  }
}

/**
 * FIFO of pending names that can also answer "is this name still queued"
 */
class WorkQueue implements NameSet {
  private items: string[] = []
  private head = 0
  private counts = new Map<string, number>()

  push(name: string): void {
    this.items.push(name)
    this.counts.set(name, (this.counts.get(name) ?? 0) + 1)
  }

  shift(): string | undefined {
    if (this.head >= this.items.length) return undefined
    const name = this.items[this.head]
    this.head++
    if (name === undefined) return undefined

    const count = (this.counts.get(name) ?? 1) - 1
    if (count > 0) {
      this.counts.set(name, count)
    } else {
      this.counts.delete(name)
    }
    return name
  }

  has(name: string): boolean {
    return this.counts.has(name)
  }
}

export class DependencyResolver {
  private recipes: RecipeSource
  private providers: ProviderResolver
  private installed: InstalledSource
  private archFor: (environment: string) => string
  private overrides: Readonly<Record<string, string>>
  private buildArches: readonly string[]
  private logger: Logger

  constructor(options: DependencyResolverOptions) {
    this.recipes = options.recipes
    this.providers = options.providers
    this.installed = options.installed
    this.archFor = options.archFor
    this.overrides = options.overrides ?? {}
    this.buildArches = options.buildArches ?? BUILD_DEVICE_ARCHES
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Package as the local recipe tree describes it. The version combines
   * pkgver and pkgrel ("1.2-r3").
   *
   * @returns null when no recipe builds the name
   */
  packageFromRecipes(name: string): ResolvedPackage | null {
    const dir = this.recipes.find(name)
    if (!dir) return null

    const recipe = this.recipes.parse(dir)
    const version = `${recipe.pkgver}-r${recipe.pkgrel}`
    this.logger.verbose(`${name}: provided by: ${recipe.pkgname}-${version} in ${dir}`)
    return {
      pkgname: recipe.pkgname,
      depends: recipe.depends,
      version,
    }
  }

  /**
   * The binary provider of a name, unless the recipe is newer. Binary
   * records win on equal versions: their depends carry the resolved
   * shared library names.
   *
   * @returns the recipe package when no index provides the name
   */
  packageFromIndex(
    name: string,
    install: NameSet,
    recipe: ResolvedPackage | null,
    environment = 'native'
  ): ResolvedPackage | null {
    const provider = this.providers.resolveOne(name, {
      install,
      installed: () => this.installed.get(environment),
      overrides: this.overrides,
      arch: this.archFor(environment),
    })
    if (!provider) return recipe

    if (recipe && compare(recipe.version, provider.version) === 1) {
      this.logger.verbose(`${name}: binary package is outdated`)
      return recipe
    }

    if (recipe) {
      this.logger.verbose(
        `${name}: binary package is up to date, using binary dependencies instead of the ones from the aport`
      )
    }
    return provider
  }

  /**
   * Find a package in the recipe tree, then in the indexes of `arch`, then
   * in the indexes of the other build architectures. A recipe that cannot
   * be built for `arch` gives way to a binary package of exactly that
   * arch. The result may be for another arch; check it with
   * {@link DependencyResolver.checkArch}.
   *
   * @throws PackageNotFoundError when nothing has it and `mustExist`
   */
  packageGet(name: string, arch: string, mustExist = true): PackageInfo | null {
    let ret: PackageInfo | null = null

    const dir = this.recipes.find(name)
    if (dir) {
      const recipe = this.recipes.parse(dir)
      ret = {
        pkgname: recipe.pkgname,
        version: `${recipe.pkgver}-r${recipe.pkgrel}`,
        depends: [...recipe.depends],
        provides: [...recipe.provides],
        arch: [...recipe.arch],
      }
    }

    if (!ret || !checkArches(ret.arch, arch)) {
      const binary = this.providers.package(name, { arch, mustExist: false })
      if (!ret || (binary && binary.arch === arch)) {
        ret = binary ? infoFromRecord(binary) : null
      }
    }

    if (!ret) {
      for (const other of this.buildArches) {
        if (other === arch) continue
        const binary = this.providers.package(name, { arch: other, mustExist: false })
        if (binary) {
          this.logger.verbose(`${name}: only found for ${other}`)
          ret = infoFromRecord(binary)
          break
        }
      }
    }

    if (!ret && mustExist) {
      throw new PackageNotFoundError(name)
    }
    return ret
  }

  /**
   * Whether a package can be built for `arch` or has a binary package for
   * it. With `binary` false only the recipe is consulted.
   *
   * @throws PackageNotFoundError when the package does not exist at all
   * @throws ValidationError when `binary` is false and no recipe builds it
   */
  checkArch(name: string, arch: string, binary = true): boolean {
    if (binary) {
      const found = this.packageGet(name, arch)
      return found !== null && checkArches(found.arch, arch)
    }

    const dir = this.recipes.find(name)
    if (!dir) {
      throw new ValidationError(`Could not find aport for package: ${name}`, { package: name })
    }
    return checkArches(this.recipes.parse(dir).arch, arch)
  }

  /**
   * Every package needed to install `names` in an environment, in the
   * order they were first resolved. Names prefixed with "!" are conflicts:
   * they appear as "!pkgname", are never expanded, and are dropped when
   * nothing provides them.
   *
   * @throws ResolutionError when a regular name cannot be found, listing
   *         the packages that required it
   */
  recurse(names: readonly string[], environment = 'native'): string[] {
    this.logger.debug(`(${environment}) calculate depends of ${names.join(', ')}`)

    const queue = new WorkQueue()
    for (const name of names) queue.push(name)

    const ret: string[] = []
    const seen = new Set<string>()
    const requiredBy = new Map<string, Set<string>>()
    const install: NameSet = { has: (name) => seen.has(name) || queue.has(name) }

    for (let entry = queue.shift(); entry !== undefined; entry = queue.shift()) {
      if (seen.has(entry)) continue

      const conflict = entry.startsWith('!')
      const name = entry.replace(/^!+/, '')

      const recipe = this.packageFromRecipes(name)
      const pkg = this.packageFromIndex(name, install, recipe, environment)

      if (!pkg) {
        // A conflicting package that no longer exists cannot be installed
        if (conflict) continue

        const requesters = [...(requiredBy.get(name) ?? [])]
        const source = requesters.length > 0 ? requesters.join(', ') : 'world'
        throw new ResolutionError(
          `Could not find dependency '${name}' in checked out pmaports dir or any APKINDEX. Required by '${source}'.`,
          name,
          requesters
        )
      }

      const pkgname = conflict ? `!${pkg.pkgname}` : pkg.pkgname
      if (seen.has(pkgname)) {
        this.logger.verbose(`${pkgname}: already found`)
        continue
      }

      if (!conflict) {
        this.logger.verbose(`${pkgname}: depends on: ${pkg.depends.join(',')}`)
        for (const dep of pkg.depends) {
          queue.push(dep)
          let set = requiredBy.get(dep)
          if (!set) {
            set = new Set()
            requiredBy.set(dep, set)
          }
          set.add(name)
        }
      }

      ret.push(pkgname)
      seen.add(pkgname)
    }

    return ret
  }
}
