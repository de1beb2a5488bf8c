/**
 * Local recipe tree
 *
 * Locates the recipe directory that builds a package, including packages
 * that are only subpackages or versioned provides of another recipe.
 */

import { readFileSync } from 'node:fs'
import { basename, dirname, join, resolve } from 'node:path'
import fg from 'fast-glob'
import { ParseError, ValidationError } from '../errors'
import { silentLogger, type Logger } from '../log'
import { validate } from '../version'
import { parseApkbuild } from './apkbuild'
import type { RecipeMetadata } from './types'

export interface RecipeTreeOptions {
  /** Root of the recipe checkout */
  root: string
  logger?: Logger
  /**
   * Require the directory name to equal pkgname
   * @default true
   */
  checkPkgname?: boolean
  /**
   * Require a valid pkgver
   * @default true
   */
  checkPkgver?: boolean
}

export class RecipeTree {
  readonly root: string
  private logger: Logger
  private checkPkgname: boolean
  private checkPkgver: boolean

  // The tree is assumed not to change while this object lives
  private apkbuilds: Map<string, string> | null = null
  private found = new Map<string, string | null>()
  private parsed = new Map<string, RecipeMetadata>()

  constructor(options: RecipeTreeOptions) {
    this.root = resolve(options.root)
    this.logger = options.logger ?? silentLogger
    this.checkPkgname = options.checkPkgname ?? true
    this.checkPkgver = options.checkPkgver ?? true
  }

  /**
   * Directory of the recipe that builds `name`.
   *
   * Tries the recipe of that exact name, then guesses the main package
   * (see {@link RecipeTree.guessMain}) and checks the guess's subpackages
   * and versioned provides, then checks every recipe. When nothing
   * confirms it, the guess is returned anyway, since subpackages can be
   * generated by shell code that is not read here.
   *
   * @throws ValidationError for a name containing "*", or when nothing is
   *         found and `mustExist` is set
   */
  find(name: string, mustExist = false): string | null {
    let ret = this.found.get(name)

    if (ret === undefined) {
      if (name.includes('*')) {
        throw new ValidationError(`Invalid pkgname: ${name}`, { package: name })
      }

      ret = null
      const exact = this.index().get(name)
      if (exact) {
        ret = dirname(exact)
      } else {
        const guess = this.guessMain(name)
        if (guess) {
          if (this.recipeProvides(name, join(guess, 'APKBUILD'))) {
            ret = guess
          } else {
            for (const path of this.index().values()) {
              if (this.recipeProvides(name, path)) {
                ret = dirname(path)
                break
              }
            }
          }
          ret ??= guess
        }
      }
      this.found.set(name, ret)
    }

    if (ret === null && mustExist) {
      throw new ValidationError(`Could not find aport for package: ${name}`, { package: name })
    }
    return ret
  }

  /**
   * Guess the recipe a subpackage belongs to. "foo-dev" belongs to "foo";
   * otherwise dash-separated words are cut from the end until a recipe
   * matches ("u-boot-some-device" -> "u-boot-some" -> "u-boot").
   */
  guessMain(subpkgname: string): string | null {
    if (subpkgname.endsWith('-dev')) {
      const pkgname = subpkgname.slice(0, -4)
      const path = this.index().get(pkgname)
      if (path) {
        this.logger.verbose(`${subpkgname}: guessed to be a subpackage of ${pkgname} (just removed '-dev')`)
        return dirname(path)
      }
      this.logger.verbose(
        `${subpkgname}: guessed to be a subpackage of ${pkgname}, which we can't find in pmaports, so it's probably in Alpine`
      )
      return null
    }

    const words = subpkgname.split('-')
    while (words.length > 1) {
      words.pop()
      const pkgname = words.join('-')
      const path = this.index().get(pkgname)
      if (path) {
        this.logger.verbose(`${subpkgname}: guessed to be a subpackage of ${pkgname}`)
        return dirname(path)
      }
    }
    return null
  }

  /**
   * Parse the APKBUILD in a recipe directory (cached).
   *
   * @throws ParseError for a pkgname that differs from the directory name
   *         or an invalid pkgver
   */
  parse(dir: string): RecipeMetadata {
    const path = join(resolve(dir), 'APKBUILD')
    const cached = this.parsed.get(path)
    if (cached) return cached

    const recipe = parseApkbuild(readFileSync(path, 'utf-8'), path, this.logger)

    if (this.checkPkgname && basename(dirname(path)) !== recipe.pkgname) {
      this.logger.info(`Folder: '${dirname(path)}'`)
      this.logger.info(`Pkgname: '${recipe.pkgname}'`)
      throw new ParseError('The pkgname must be equal to the name of the folder that contains the APKBUILD!', {
        path,
        package: recipe.pkgname,
      })
    }

    if (this.checkPkgver && !validate(recipe.pkgver)) {
      throw new ParseError(`Invalid pkgver '${recipe.pkgver}' in APKBUILD: ${path}`, {
        path,
        package: recipe.pkgname,
      })
    }

    this.parsed.set(path, recipe)
    return recipe
  }

  /**
   * Whether the recipe at `path` builds `name` as a subpackage or provides
   * it with a version ("name=1.0"). Unversioned provides never count.
   */
  private recipeProvides(name: string, path: string): boolean {
    const recipe = this.parse(dirname(path))
    if (recipe.subpackages.has(name)) return true

    const provides = [recipe.provides]
    for (const subpackage of recipe.subpackages.values()) {
      if (subpackage) provides.push(subpackage.provides)
    }

    return provides.some((list) =>
      list.some((entry) => {
        const eq = entry.indexOf('=')
        return eq !== -1 && entry.slice(0, eq) === name
      })
    )
  }

  /**
   * Recipe name -> APKBUILD path, for every `<root>/**\/<name>/APKBUILD`.
   */
  private index(): Map<string, string> {
    if (this.apkbuilds) return this.apkbuilds

    const found = new Map<string, string>()
    const paths = fg.sync('**/*/APKBUILD', { cwd: this.root, absolute: true, onlyFiles: true })
    for (const path of paths) {
      const name = basename(dirname(path))
      if (found.has(name)) {
        throw new ValidationError(
          `Package ${name} found in multiple aports subfolders. Please put it only in one folder.`,
          { package: name }
        )
      }
      found.set(name, path)
    }

    this.apkbuilds = new Map([...found].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
    return this.apkbuilds
  }
}
