import type { VerinfoOptions } from './packages/verinfo/src/types'

const config: VerinfoOptions = {
  input: '__version__.py',
  output: 'version.txt',
  quiet: false,
}

export default config
