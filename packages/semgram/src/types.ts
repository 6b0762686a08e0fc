import type { ParseError } from './error.js'
import type { Version } from './version.js'

/**
 * The part of the grammar a parse failure occurred in
 */
export type VersionField = 'major' | 'minor' | 'patch' | 'pre-release' | 'build'

export type ParseErrorKind =
  | 'unexpected-end'
  | 'unexpected-character'
  | 'leading-zero'
  | 'missing-separator'
  | 'overflow'
  | 'empty-identifier'
  | 'trailing-characters'

export type ParseResult =
  | { ok: true, version: Version }
  | { ok: false, error: ParseError }

export interface VersionFields {
  major: number
  minor: number
  patch: number
  preRelease?: string
  build?: string
}

export interface SemgramConfig {
  /** Print machine-readable JSON instead of text _(default: false)_ */
  json: boolean
  /** Colorize human-readable output _(default: true)_ */
  colors: boolean
  /** Print extra diagnostic lines _(default: false)_ */
  verbose: boolean
  /** Print the input with a caret under the failing offset _(default: true)_ */
  showSource: boolean
}

export type SemgramOptions = Partial<SemgramConfig>

/**
 * Flags as cac hands them over; `color` is true unless `--no-color` is given
 */
export interface CLIOptions {
  json?: boolean
  color?: boolean
  verbose?: boolean
  quiet?: boolean
}

export enum ExitCode {
  Success = 0,
  InvalidVersion = 1,
  FatalError = 2,
}

/**
 * Output sink for CLI commands
 */
export interface Reporter {
  log: (message: string) => void
  error: (message: string) => void
  verbose: (message: string) => void
}
