import type { VersionFields } from './types.js'
import { before, equals } from './compare.js'

/**
 * A parsed semantic version. Instances come out of the parser and are frozen.
 */
export class Version {
  readonly major: number
  readonly minor: number
  readonly patch: number
  readonly preRelease?: string
  readonly build?: string

  constructor({ major, minor, patch, preRelease, build }: VersionFields) {
    this.major = major
    this.minor = minor
    this.patch = patch
    this.preRelease = preRelease
    this.build = build
    Object.freeze(this)
  }

  get preReleaseIdentifiers(): readonly string[] {
    return this.preRelease === undefined ? [] : this.preRelease.split('.')
  }

  get buildIdentifiers(): readonly string[] {
    return this.build === undefined ? [] : this.build.split('.')
  }

  /**
   * Same major, minor, patch and pre-release text. Build metadata is ignored.
   */
  equals(other: Version): boolean {
    return equals(this, other)
  }

  /**
   * Whether this version has strictly lower precedence than `other`
   */
  before(other: Version): boolean {
    return before(this, other)
  }

  toString(): string {
    let versionStr = `${this.major}.${this.minor}.${this.patch}`
    if (this.preRelease !== undefined) {
      versionStr += `-${this.preRelease}`
    }
    if (this.build !== undefined) {
      versionStr += `+${this.build}`
    }
    return versionStr
  }

  toJSON(): VersionFields & { version: string } {
    return {
      major: this.major,
      minor: this.minor,
      patch: this.patch,
      preRelease: this.preRelease,
      build: this.build,
      version: this.toString(),
    }
  }
}
