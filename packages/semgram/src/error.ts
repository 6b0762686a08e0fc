import type { ParseErrorKind, VersionField } from './types.js'

export interface ParseErrorDetails {
  kind: ParseErrorKind
  reason: string
  position: number
  input: string
  field?: VersionField
}

function describeLocation(field: VersionField | undefined): string {
  switch (field) {
    case 'major':
    case 'minor':
    case 'patch':
      return `invalid version core: ${field}: `
    case 'pre-release':
      return 'invalid pre-release: '
    case 'build':
      return 'invalid build: '
    default:
      return ''
  }
}

/**
 * A grammar violation found while scanning a version string.
 *
 * `position` is the offset into `input` where scanning stopped; `reason` is the
 * bare cause, while `message` also names the grammar rule and the offset.
 */
export class ParseError extends Error {
  readonly kind: ParseErrorKind
  readonly reason: string
  readonly position: number
  readonly input: string
  readonly field?: VersionField

  constructor({ kind, reason, position, input, field }: ParseErrorDetails) {
    super(`${describeLocation(field)}${reason} (at position ${position})`)
    this.name = 'ParseError'
    this.kind = kind
    this.reason = reason
    this.position = position
    this.input = input
    this.field = field
  }
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError
}
