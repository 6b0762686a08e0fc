/* eslint-disable no-console */
import type { ParseError } from './error.js'
import type { Reporter } from './types.js'
import type { Version } from './version.js'

/**
 * Console symbols for better output
 */
export const symbols = {
  success: '✓',
  error: '✗',
}

/**
 * Colorize console output (simple ANSI colors)
 */
export const colors = {
  red: (text: string) => `\x1B[31m${text}\x1B[0m`,
  gray: (text: string) => `\x1B[90m${text}\x1B[0m`,
  bold: (text: string) => `\x1B[1m${text}\x1B[0m`,
}

export type Colors = typeof colors

const plain: Colors = {
  red: text => text,
  gray: text => text,
  bold: text => text,
}

export function getColors(enabled: boolean): Colors {
  return enabled ? colors : plain
}

/**
 * Render the failing input with a caret under the offset the parser stopped at
 */
export function formatSourcePointer(error: ParseError): string[] {
  return [
    `  ${error.input}`,
    `  ${' '.repeat(error.position)}^`,
  ]
}

/**
 * One `label: value` line per field, followed by the string representation
 */
export function describeVersion(version: Version, c: Colors = plain): string[] {
  const none = c.gray('(none)')
  return [
    `${c.bold('major:')} ${version.major}`,
    `${c.bold('minor:')} ${version.minor}`,
    `${c.bold('patch:')} ${version.patch}`,
    `${c.bold('pre-release:')} ${version.preRelease ?? none}`,
    `${c.bold('build:')} ${version.build ?? none}`,
    `${c.bold('version:')} ${version.toString()}`,
  ]
}

export function createConsoleReporter(verbose: boolean = false): Reporter {
  return {
    log: message => console.log(message),
    error: message => console.error(message),
    verbose: (message) => {
      if (verbose) {
        console.log(colors.gray(message))
      }
    },
  }
}
