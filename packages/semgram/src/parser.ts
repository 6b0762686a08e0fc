import type { ParseErrorKind, ParseResult, VersionField } from './types.js'
import { ParseError } from './error.js'
import { Version } from './version.js'

/*
 * Grammar (Semantic Versioning 2.0.0), as accepted here:
 *
 *   <valid semver>  ::= <version core> [ "-" <identifiers> ] [ "+" <identifiers> ]
 *   <version core>  ::= <numeric> "." <numeric> "." <numeric>
 *   <numeric>       ::= "0" | <positive digit> { <digit> }
 *   <identifiers>   ::= <identifier> { "." <identifier> }
 *   <identifier>    ::= ( <letter> | <digit> | "-" ) { <letter> | <digit> | "-" }
 *
 * Pre-release identifiers are not checked for leading zeros; whether an
 * identifier is numeric only matters when comparing.
 */

function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39
}

function isLetter(code: number): boolean {
  return (code >= 0x41 && code <= 0x5A) || (code >= 0x61 && code <= 0x7A)
}

function isIdentifierCharacter(code: number): boolean {
  return isDigit(code) || isLetter(code) || code === 0x2D
}

class Parser {
  private pos = 0

  constructor(private readonly input: string) {}

  parseVersion(): Version {
    const major = this.parseNumericIdentifier('major')
    this.expectDot('major')
    const minor = this.parseNumericIdentifier('minor')
    this.expectDot('minor')
    const patch = this.parseNumericIdentifier('patch')

    let preRelease: string | undefined
    let build: string | undefined
    if (this.consume('-')) {
      preRelease = this.parseIdentifiers('pre-release')
    }
    if (this.consume('+')) {
      build = this.parseIdentifiers('build')
    }

    if (!this.atEnd()) {
      const rest = this.input.slice(this.pos)
      throw this.fail('trailing-characters', `unexpected trailing characters: ${JSON.stringify(rest)}`)
    }

    return new Version({ major, minor, patch, preRelease, build })
  }

  private parseNumericIdentifier(field: VersionField): number {
    const start = this.pos

    if (this.consume('0')) {
      if (this.matchDigit()) {
        throw this.fail('leading-zero', 'leading zero is not allowed', field)
      }
      return 0
    }

    if (this.atEnd()) {
      throw this.fail('unexpected-end', 'unexpected end of input', field)
    }

    if (!this.matchDigit()) {
      throw this.fail('unexpected-character', `expected positive digit, got ${this.describeCurrent()}`, field)
    }

    while (this.matchDigit()) {
      this.pos++
    }

    const value = Number(this.input.slice(start, this.pos))
    if (!Number.isSafeInteger(value)) {
      throw this.fail('overflow', `numeric identifier exceeds ${Number.MAX_SAFE_INTEGER}`, field, start)
    }

    return value
  }

  private expectDot(field: VersionField): void {
    if (!this.consume('.')) {
      throw this.fail('missing-separator', `missing dot separator after ${field}`, field)
    }
  }

  private parseIdentifiers(field: VersionField): string {
    const start = this.pos

    this.parseIdentifier(field)
    while (this.consume('.')) {
      this.parseIdentifier(field)
    }

    return this.input.slice(start, this.pos)
  }

  private parseIdentifier(field: VersionField): void {
    const start = this.pos

    while (!this.atEnd() && isIdentifierCharacter(this.input.charCodeAt(this.pos))) {
      this.pos++
    }

    if (this.pos === start) {
      throw this.fail('empty-identifier', `expected alphanumeric identifier, got ${this.describeCurrent()}`, field)
    }
  }

  private atEnd(): boolean {
    return this.pos >= this.input.length
  }

  private consume(ch: string): boolean {
    if (this.input[this.pos] === ch) {
      this.pos++
      return true
    }
    return false
  }

  private matchDigit(): boolean {
    return !this.atEnd() && isDigit(this.input.charCodeAt(this.pos))
  }

  private describeCurrent(): string {
    const code = this.input.codePointAt(this.pos)
    if (code === undefined)
      return 'end of input'
    return `'${String.fromCodePoint(code)}'`
  }

  private fail(kind: ParseErrorKind, reason: string, field?: VersionField, position: number = this.pos): ParseError {
    return new ParseError({ kind, reason, position, input: this.input, field })
  }
}

/**
 * Parse a semantic version string.
 *
 * Scanning stops at the first grammar violation; the returned error carries
 * its offset and cause.
 *
 * @example
 * const result = parse('1.0.0-alpha.1+001')
 * if (result.ok)
 *   console.log(result.version.preRelease) // 'alpha.1'
 */
export function parse(input: string): ParseResult {
  try {
    return { ok: true, version: new Parser(input).parseVersion() }
  }
  catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error }
    }
    throw error
  }
}

/**
 * Like {@link parse}, but throws the `ParseError`
 */
export function parseVersion(input: string): Version {
  const result = parse(input)
  if (!result.ok) {
    throw result.error
  }
  return result.version
}

/**
 * Check if a string is a valid semver version
 */
export function isValid(input: string): boolean {
  return parse(input).ok
}
