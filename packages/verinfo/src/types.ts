import type { TextSink, TextSource } from './io'

export interface GenerateOptions {
  /**
   * Version-declaration file, relative to `cwd`
   */
  input?: string

  /**
   * Descriptor file to write, relative to `cwd`
   */
  output?: string

  /**
   * Name the version is assigned to, e.g. `__version__ = '1.2.3'`
   */
  identifier?: string

  /**
   * Literal tokens removed from the version before it is split into parts
   */
  suffixes?: string[]

  /**
   * Fail instead of writing the `Unknown` sentinel when no version is found
   */
  strict?: boolean

  /**
   * Extra string table entries, e.g. `{ CompanyName: 'Example Ltd' }`
   */
  strings?: Record<string, string>

  dryRun?: boolean
  quiet?: boolean
  cwd?: string
  source?: TextSource
  sink?: TextSink
  logger?: LineLogger
  progress?: ProgressCallback
}

export interface VerinfoConfig {
  input: string
  output: string
  identifier: string
  suffixes: string[]
  strict: boolean
  strings: Record<string, string>
  dryRun: boolean
  quiet: boolean
}

export type VerinfoOptions = Partial<VerinfoConfig>

export type LineLogger = (line: string) => void

/**
 * Outcome of looking for a version in a declaration file
 */
export type ExtractedVersion =
  | { found: true, version: string }
  | { found: false }

/**
 * Always exactly four components: major, minor, patch, build
 */
export type VersionParts = [string, string, string, string]

export enum GenerateEvent {
  VersionExtracted = 'versionExtracted',
  DescriptorRendered = 'descriptorRendered',
  DescriptorWritten = 'descriptorWritten',
}

export interface GenerateProgress {
  event: GenerateEvent
  version: string
  outputPath: string
}

export type ProgressCallback = (progress: GenerateProgress) => void

export interface GenerateResult {
  /**
   * Raw version string, or `Unknown` when none was found
   */
  version: string
  found: boolean
  parts: VersionParts
  content: string
  inputPath: string
  outputPath: string
  written: boolean
}

export interface DescriptorFields {
  version: string
  parts: VersionParts
  strings?: Record<string, string>
}

export enum ExitCode {
  InvalidArgument = 1,
  FatalError = 2,
}
