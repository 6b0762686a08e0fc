import type { Version } from './version.js'

const NUMERIC_IDENTIFIER = /^\d+$/

function compareBigInts(a: bigint, b: bigint): number {
  if (a < b)
    return -1
  if (a > b)
    return 1
  return 0
}

/**
 * Compare two pre-release identifiers.
 *
 * Digit-only identifiers compare by value and sort before any identifier that
 * contains a letter or hyphen; everything else compares lexically.
 */
export function compareIdentifiers(a: string, b: string): number {
  const aIsNumeric = NUMERIC_IDENTIFIER.test(a)
  const bIsNumeric = NUMERIC_IDENTIFIER.test(b)

  if (aIsNumeric && bIsNumeric)
    return compareBigInts(BigInt(a), BigInt(b))
  if (aIsNumeric)
    return -1
  if (bIsNumeric)
    return 1

  if (a < b)
    return -1
  if (a > b)
    return 1
  return 0
}

/**
 * Compare two pre-release sections, `undefined` meaning the version has none.
 * A version without a pre-release section sorts after one that has it.
 */
export function comparePreRelease(a: string | undefined, b: string | undefined): number {
  if (a === undefined && b === undefined)
    return 0
  if (a === undefined)
    return 1
  if (b === undefined)
    return -1

  const aIdentifiers = a.split('.')
  const bIdentifiers = b.split('.')
  const length = Math.max(aIdentifiers.length, bIdentifiers.length)

  for (let i = 0; i < length; i++) {
    const left = aIdentifiers[i]
    const right = bIdentifiers[i]
    if (left === undefined)
      return -1
    if (right === undefined)
      return 1

    const result = compareIdentifiers(left, right)
    if (result !== 0)
      return result
  }

  return 0
}

/**
 * Build metadata takes no part in equality, and pre-release sections must
 * match character for character.
 */
export function equals(a: Version, b: Version): boolean {
  return a.major === b.major
    && a.minor === b.minor
    && a.patch === b.patch
    && a.preRelease === b.preRelease
}

export function before(a: Version, b: Version): boolean {
  if (a.major !== b.major)
    return a.major < b.major
  if (a.minor !== b.minor)
    return a.minor < b.minor
  if (a.patch !== b.patch)
    return a.patch < b.patch
  return comparePreRelease(a.preRelease, b.preRelease) < 0
}
