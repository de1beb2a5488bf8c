/**
 * APKINDEX - package index parsing
 */

export type {
  PackageRecord,
  ProviderIndex,
  InstalledIndex,
  IndexViews,
  StatFn,
  ReadFileFn,
} from './types'

export { parseIndexText, stripConstraint, addProvider, addInstalled } from './block'
export { IndexParser, readIndexText, type IndexParserOptions } from './parser'
