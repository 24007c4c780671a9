import type { VerinfoConfig } from './types'

export const defaultConfig: VerinfoConfig = {
  // Input options
  input: '__version__.py',
  identifier: '__version__',
  suffixes: ['-service-refactor'],

  // Output options
  output: 'version.txt',
  strings: {},

  // Behavior options
  strict: false, // Legacy behavior writes the Unknown sentinel instead of failing
  dryRun: false,
  quiet: false,
}
