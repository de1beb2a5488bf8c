/**
 * apkdeps - package metadata engine for apk based distributions
 *
 * @example
 * ```typescript
 * import { compare, createEngine, resolveConfig } from 'apkdeps'
 *
 * compare('1.2.3', '1.2.3-r1') // -1
 *
 * const engine = createEngine(resolveConfig({ work: '/var/lib/bootstrap' }))
 * engine.depends.recurse(['postmarketos-base-ui'])
 * ```
 *
 * @example CLI
 * ```bash
 * apkdeps compare 1.0 1.0_p1
 * apkdeps providers so:libGL.so.1 --pick
 * apkdeps depends device-foo --env rootfs_foo
 * ```
 *
 * @packageDocumentation
 */

export * from './core'

export {
  createCLI,
  runCLI,
  type CLIInstance,
  type CLIContext,
  type CommandResult,
} from './cli'
