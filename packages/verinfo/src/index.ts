export { defaultConfig, defineConfig, loadVerinfoConfig, resetConfigCache } from './config'
export { FIXED_FILE_INFO, renderDescriptor, STRING_TABLE_ID, TRANSLATION } from './descriptor'
export { generate } from './generate'
export { fileSink, fileSource, MemoryFiles } from './io'
export type { TextSink, TextSource } from './io'
export * from './types'
export { extractVersion, normalizeVersion, padVersionParts, stripSuffixes, UNKNOWN_VERSION } from './version'
