export { runCompare, runParse, runValid, relate } from './commands.js'
export type { Relation } from './commands.js'
export { compareIdentifiers, comparePreRelease } from './compare.js'
export { defaultConfig, defineConfig, loadSemgramConfig, toOverrides } from './config.js'
export { isParseError, ParseError } from './error.js'
export type { ParseErrorDetails } from './error.js'
export { isValid, parse, parseVersion } from './parser.js'
export * from './types.js'
export { Version } from './version.js'
