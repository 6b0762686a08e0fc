#!/usr/bin/env node
import type { CLIOptions } from '../src/types.js'
import process from 'node:process'
import { CAC } from 'cac'
import pkg from '../package.json' with { type: 'json' }
import { runCompare, runParse, runValid } from '../src/commands.js'
import { loadSemgramConfig, toOverrides } from '../src/config.js'
import { ExitCode } from '../src/types.js'
import { colors, createConsoleReporter, symbols } from '../src/utils.js'

const cli = new CAC('semgram')

/**
 * Error handler
 */
function errorHandler(error: Error): never {
  let message = error.message || String(error)

  if (process.env.CI || process.env.DEBUG) {
    message += `\n\n${error.stack || ''}`
  }

  console.error(colors.red(`${symbols.error} ${message}`))
  process.exit(ExitCode.FatalError)
}

async function run(command: (options: CLIOptions) => ExitCode | Promise<ExitCode>, options: CLIOptions): Promise<void> {
  try {
    process.exitCode = await command(options)
  }
  catch (error) {
    errorHandler(error instanceof Error ? error : new Error(String(error)))
  }
}

cli
  .command('parse <version>', 'Parse a version and print its fields')
  .option('--json', 'Print JSON')
  .option('--no-color', 'Disable colors')
  .option('--verbose', 'Enable verbose output')
  .example('semgram parse 1.0.0-alpha.1+001')
  .action((input: string, options: CLIOptions) => run(async (opts) => {
    const config = await loadSemgramConfig(toOverrides(opts))
    return runParse(input, config, createConsoleReporter(config.verbose))
  }, options))

cli
  .command('valid <version>', 'Exit with 0 when the version is valid')
  .option('--json', 'Print JSON')
  .option('--no-color', 'Disable colors')
  .option('--verbose', 'Enable verbose output')
  .option('-q, --quiet', 'Do not print the parse error')
  .example('semgram valid 1.2.3')
  .action((input: string, options: CLIOptions) => run(async (opts) => {
    const config = await loadSemgramConfig(toOverrides(opts))
    return runValid(input, config, createConsoleReporter(config.verbose), opts.quiet)
  }, options))

cli
  .command('compare <a> <b>', 'Print how two versions are ordered')
  .option('--json', 'Print JSON')
  .option('--no-color', 'Disable colors')
  .option('--verbose', 'Enable verbose output')
  .example('semgram compare 1.0.0-rc.1 1.0.0')
  .action((a: string, b: string, options: CLIOptions) => run(async (opts) => {
    const config = await loadSemgramConfig(toOverrides(opts))
    return runCompare(a, b, config, createConsoleReporter(config.verbose))
  }, options))

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:')
  errorHandler(error)
})
process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:')
  errorHandler(reason instanceof Error ? reason : new Error(String(reason)))
})

cli.version(pkg.version)
cli.help()
cli.parse()
