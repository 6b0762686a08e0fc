import type { Reporter, SemgramConfig } from '../src/types.js'
import { describe, expect, it } from 'vitest'
import { relate, runCompare, runParse, runValid } from '../src/commands.js'
import { parseVersion } from '../src/parser.js'
import { ExitCode } from '../src/types.js'

const plainConfig: SemgramConfig = {
  json: false,
  colors: false,
  verbose: false,
  showSource: true,
}

function createReporter() {
  const out: string[] = []
  const err: string[] = []
  const verbose: string[] = []
  const reporter: Reporter = {
    log: message => out.push(message),
    error: message => err.push(message),
    verbose: message => verbose.push(message),
  }
  return { out, err, verbose, reporter }
}

describe('CLI commands', () => {
  describe('parse', () => {
    it('should print each field and the string representation', () => {
      const { out, err, verbose, reporter } = createReporter()

      const code = runParse('1.0.0-alpha.1+001', plainConfig, reporter)

      expect(code).toBe(ExitCode.Success)
      expect(out).toEqual([
        'major: 1',
        'minor: 0',
        'patch: 0',
        'pre-release: alpha.1',
        'build: 001',
        'version: 1.0.0-alpha.1+001',
      ])
      expect(err).toEqual([])
      expect(verbose).toEqual([
        'pre-release identifiers: alpha, 1',
        'build identifiers: 001',
      ])
    })

    it('should mark absent sections', () => {
      const { out, reporter } = createReporter()

      runParse('1.2.3', plainConfig, reporter)

      expect(out[3]).toBe('pre-release: (none)')
      expect(out[4]).toBe('build: (none)')
    })

    it('should point at the failing offset', () => {
      const { out, err, verbose, reporter } = createReporter()

      const code = runParse('1.00.0', plainConfig, reporter)

      expect(code).toBe(ExitCode.InvalidVersion)
      expect(out).toEqual([])
      expect(err).toEqual([
        '✗ invalid version core: minor: leading zero is not allowed (at position 3)',
        '  1.00.0',
        '     ^',
      ])
      expect(verbose).toEqual(['kind: leading-zero, field: minor'])
    })

    it('should omit the source line when showSource is off', () => {
      const { err, reporter } = createReporter()

      runParse('1.0.', { ...plainConfig, showSource: false }, reporter)

      expect(err).toEqual(['✗ invalid version core: patch: unexpected end of input (at position 4)'])
    })

    it('should color the error when colors are on', () => {
      const { err, reporter } = createReporter()

      runParse('1.0.', { ...plainConfig, colors: true, showSource: false }, reporter)

      expect(err[0]).toBe('\x1B[31m✗ invalid version core: patch: unexpected end of input (at position 4)\x1B[0m')
    })

    it('should print JSON', () => {
      const { out, reporter } = createReporter()

      runParse('1.2.3-rc.1', { ...plainConfig, json: true }, reporter)

      expect(JSON.parse(out[0] ?? '')).toEqual({
        major: 1,
        minor: 2,
        patch: 3,
        preRelease: 'rc.1',
        version: '1.2.3-rc.1',
      })
    })

    it('should print JSON errors on stdout', () => {
      const { out, err, reporter } = createReporter()

      const code = runParse('1.0.', { ...plainConfig, json: true }, reporter)

      expect(code).toBe(ExitCode.InvalidVersion)
      expect(err).toEqual([])
      expect(JSON.parse(out[0] ?? '')).toEqual({
        error: {
          input: '1.0.',
          kind: 'unexpected-end',
          field: 'patch',
          position: 4,
          message: 'invalid version core: patch: unexpected end of input (at position 4)',
        },
      })
    })
  })

  describe('valid', () => {
    it('should print nothing for a valid version', () => {
      const { out, err, verbose, reporter } = createReporter()

      const code = runValid('1.2.3', plainConfig, reporter)

      expect(code).toBe(ExitCode.Success)
      expect(out).toEqual([])
      expect(err).toEqual([])
      expect(verbose).toEqual(['✓ 1.2.3 is valid'])
    })

    it('should report an invalid version', () => {
      const { err, reporter } = createReporter()

      const code = runValid('1.2', plainConfig, reporter)

      expect(code).toBe(ExitCode.InvalidVersion)
      expect(err[0]).toBe('✗ invalid version core: minor: missing dot separator after minor (at position 3)')
    })

    it('should stay silent in quiet mode', () => {
      const { out, err, reporter } = createReporter()

      const code = runValid('1.2', plainConfig, reporter, true)

      expect(code).toBe(ExitCode.InvalidVersion)
      expect(out).toEqual([])
      expect(err).toEqual([])
    })

    it('should print JSON', () => {
      const { out, reporter } = createReporter()

      runValid('1.0.0-', { ...plainConfig, json: true }, reporter)

      expect(JSON.parse(out[0] ?? '')).toEqual({
        valid: false,
        error: {
          input: '1.0.0-',
          kind: 'empty-identifier',
          field: 'pre-release',
          position: 6,
          message: 'invalid pre-release: expected alphanumeric identifier, got end of input (at position 6)',
        },
      })
    })
  })

  describe('compare', () => {
    it('should print the relation between two versions', () => {
      const { out, reporter } = createReporter()

      expect(runCompare('1.0.0-rc.1', '1.0.0', plainConfig, reporter)).toBe(ExitCode.Success)
      runCompare('2.0.0', '1.9.9', plainConfig, reporter)
      runCompare('1.0.0+a', '1.0.0+b', plainConfig, reporter)

      expect(out).toEqual([
        '1.0.0-rc.1 < 1.0.0',
        '2.0.0 > 1.9.9',
        '1.0.0+a == 1.0.0+b',
      ])
    })

    it('should fail when either side is invalid', () => {
      const { out, err, reporter } = createReporter()

      const code = runCompare('1.0.0', '1.0.0-', { ...plainConfig, showSource: false }, reporter)

      expect(code).toBe(ExitCode.InvalidVersion)
      expect(out).toEqual([])
      expect(err).toEqual(['✗ invalid pre-release: expected alphanumeric identifier, got end of input (at position 6)'])
    })

    it('should print JSON', () => {
      const { out, reporter } = createReporter()

      runCompare('1.0.0-beta.2', '1.0.0-beta.11', { ...plainConfig, json: true }, reporter)

      expect(JSON.parse(out[0] ?? '')).toEqual({
        left: '1.0.0-beta.2',
        right: '1.0.0-beta.11',
        relation: '<',
      })
    })
  })

  describe('relate', () => {
    it('should report unordered versions that are not equal', () => {
      expect(relate(parseVersion('1.0.0-01'), parseVersion('1.0.0-1'))).toBe('<>')
    })

    it('should report equality before ordering', () => {
      expect(relate(parseVersion('1.0.0'), parseVersion('1.0.0+meta'))).toBe('==')
    })
  })
})
