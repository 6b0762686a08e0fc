import type { ParseError } from './error.js'
import type { Reporter, SemgramConfig } from './types.js'
import type { Version } from './version.js'
import { parse } from './parser.js'
import { ExitCode } from './types.js'
import { describeVersion, formatSourcePointer, getColors, symbols } from './utils.js'

export type Relation = '<' | '>' | '==' | '<>'

/**
 * `<>` is reported for versions that are neither equal nor ordered, which
 * happens when pre-release sections compare equal but differ in text (`01`
 * and `1`).
 */
export function relate(a: Version, b: Version): Relation {
  if (a.equals(b))
    return '=='
  if (a.before(b))
    return '<'
  if (b.before(a))
    return '>'
  return '<>'
}

function errorToJSON(error: ParseError) {
  return {
    input: error.input,
    kind: error.kind,
    field: error.field,
    position: error.position,
    message: error.message,
  }
}

function reportParseError(error: ParseError, config: SemgramConfig, reporter: Reporter): void {
  const c = getColors(config.colors)

  if (config.json) {
    reporter.log(JSON.stringify({ error: errorToJSON(error) }, null, 2))
    return
  }

  reporter.error(c.red(`${symbols.error} ${error.message}`))
  if (config.showSource) {
    for (const line of formatSourcePointer(error)) {
      reporter.error(line)
    }
  }
  reporter.verbose(`kind: ${error.kind}${error.field ? `, field: ${error.field}` : ''}`)
}

export function runParse(input: string, config: SemgramConfig, reporter: Reporter): ExitCode {
  const result = parse(input)
  if (!result.ok) {
    reportParseError(result.error, config, reporter)
    return ExitCode.InvalidVersion
  }

  const { version } = result
  if (config.json) {
    reporter.log(JSON.stringify(version, null, 2))
    return ExitCode.Success
  }

  for (const line of describeVersion(version, getColors(config.colors))) {
    reporter.log(line)
  }
  reporter.verbose(`pre-release identifiers: ${version.preReleaseIdentifiers.join(', ') || '(none)'}`)
  reporter.verbose(`build identifiers: ${version.buildIdentifiers.join(', ') || '(none)'}`)
  return ExitCode.Success
}

export function runValid(input: string, config: SemgramConfig, reporter: Reporter, quiet: boolean = false): ExitCode {
  const result = parse(input)

  if (config.json) {
    reporter.log(JSON.stringify(result.ok
      ? { valid: true }
      : { valid: false, error: errorToJSON(result.error) }, null, 2))
    return result.ok ? ExitCode.Success : ExitCode.InvalidVersion
  }

  if (!result.ok) {
    if (!quiet) {
      reportParseError(result.error, config, reporter)
    }
    return ExitCode.InvalidVersion
  }

  reporter.verbose(`${symbols.success} ${input} is valid`)
  return ExitCode.Success
}

export function runCompare(left: string, right: string, config: SemgramConfig, reporter: Reporter): ExitCode {
  const a = parse(left)
  if (!a.ok) {
    reportParseError(a.error, config, reporter)
    return ExitCode.InvalidVersion
  }
  const b = parse(right)
  if (!b.ok) {
    reportParseError(b.error, config, reporter)
    return ExitCode.InvalidVersion
  }

  const relation = relate(a.version, b.version)
  if (config.json) {
    reporter.log(JSON.stringify({ left, right, relation }, null, 2))
  }
  else {
    reporter.log(`${left} ${relation} ${right}`)
  }
  return ExitCode.Success
}
