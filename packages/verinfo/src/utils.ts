/* eslint-disable no-console */

/**
 * Console symbols for better output
 */
export const symbols = {
  success: '✓',
  error: '✗',
  info: 'ℹ',
  package: '📦',
}

/**
 * Colorize console output (simple ANSI colors)
 */
export const colors = {
  green: (text: string) => `\x1B[32m${text}\x1B[0m`,
  red: (text: string) => `\x1B[31m${text}\x1B[0m`,
  gray: (text: string) => `\x1B[90m${text}\x1B[0m`,
}

/**
 * Step logger prefixed with an emoji
 */
export function logStep(emoji: string, message: string, isDryRun = false, log: (line: string) => void = console.log): void {
  const prefix = isDryRun ? '[DRY RUN] ' : ''
  log(`${emoji} ${prefix}${message}`)
}

/**
 * Escape special regex characters
 */
export function escapeRegExp(string: string): string {
  return string.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * cac turns numeric-looking option values into numbers
 */
export type CLIValue = string | number

/**
 * Flatten a repeatable, comma-separated CLI flag into a list
 */
export function parseList(value: CLIValue | CLIValue[] | undefined): string[] | undefined {
  if (value === undefined)
    return undefined

  const values = Array.isArray(value) ? value : [value]
  return values
    .flatMap(item => String(item).split(','))
    .map(item => item.trim())
    .filter(Boolean)
}
