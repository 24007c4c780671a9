import type { VerinfoOptions } from './src/types'
import { defineConfig } from './src/config'

const config: VerinfoOptions = defineConfig({
  // Input options (these match the defaults)
  input: '__version__.py',
  identifier: '__version__',
  suffixes: ['-service-refactor'],

  // Output options
  output: 'version.txt',

  // Fail instead of writing an "Unknown" descriptor
  strict: false,

  // Example string table entries
  // strings: {
  //   CompanyName: 'Example Ltd',
  //   ProductName: 'Example Agent',
  // },
})

export default config
