import type { ExtractedVersion, VersionParts } from './types'
import { escapeRegExp } from './utils'

export const UNKNOWN_VERSION = 'Unknown'

const PART_COUNT = 4

/**
 * Find `<identifier> = '<value>'` in a version-declaration file.
 * The first assignment wins; either quote style is accepted.
 */
export function extractVersion(content: string, identifier: string): ExtractedVersion {
  const pattern = new RegExp(`(?<![\\w.])${escapeRegExp(identifier)}\\s*=\\s*(['"])(.*?)\\1`)
  const match = content.match(pattern)

  if (!match) {
    return { found: false }
  }

  return { found: true, version: match[2] }
}

/**
 * Remove every occurrence of the given literal tokens
 */
export function stripSuffixes(value: string, suffixes: string[]): string {
  let result = value
  for (const suffix of suffixes) {
    if (suffix) {
      result = result.split(suffix).join('')
    }
  }
  return result
}

/**
 * Right-pad with `0` up to four components, dropping anything past the fourth
 */
export function padVersionParts(parts: string[]): VersionParts {
  const padded = [...parts]
  while (padded.length < PART_COUNT) {
    padded.push('0')
  }
  return [padded[0], padded[1], padded[2], padded[3]]
}

/**
 * Turn a version such as `1.2.3-service-refactor` into `['1', '2', '3', '0']`.
 * Non-numeric input passes through untouched, so `Unknown` becomes
 * `['Unknown', '0', '0', '0']`.
 */
export function normalizeVersion(version: string, suffixes: string[] = []): VersionParts {
  // suffix tokens may themselves contain dots, so strip both spellings
  const commaSuffixes = suffixes.map(suffix => suffix.replace(/\./g, ','))
  const formatted = stripSuffixes(version.replace(/\./g, ','), [...suffixes, ...commaSuffixes])
  return padVersionParts(formatted.split(','))
}
