/* eslint-disable no-console */
import type { GenerateOptions, GenerateResult, LineLogger } from './types'
import { basename, resolve } from 'node:path'
import process from 'node:process'
import { defaultConfig } from './defaults'
import { renderDescriptor } from './descriptor'
import { fileSink, fileSource } from './io'
import { GenerateEvent } from './types'
import { colors, logStep, symbols } from './utils'
import { extractVersion, normalizeVersion, UNKNOWN_VERSION } from './version'

const silent: LineLogger = () => {}

/**
 * Read the version from the declaration file and write the version-resource descriptor
 */
export function generate(options: GenerateOptions = {}): GenerateResult {
  const {
    input = defaultConfig.input,
    output = defaultConfig.output,
    identifier = defaultConfig.identifier,
    suffixes = defaultConfig.suffixes,
    strict = defaultConfig.strict,
    strings = defaultConfig.strings,
    dryRun = defaultConfig.dryRun,
    quiet = defaultConfig.quiet,
    cwd = process.cwd(),
    source = fileSource,
    sink = fileSink,
    logger = console.log,
    progress,
  } = options

  const log = quiet ? silent : logger
  const inputPath = resolve(cwd, input)
  const outputPath = resolve(cwd, output)
  const outputName = basename(outputPath)

  // A missing input aborts here, before anything is written
  const declaration = source.read(inputPath)

  const extracted = extractVersion(declaration, identifier)
  if (!extracted.found && strict) {
    throw new Error(`Could not determine version from ${inputPath}`)
  }

  const version = extracted.found ? extracted.version : UNKNOWN_VERSION
  log(`Extracted version: ${version}`)
  progress?.({ event: GenerateEvent.VersionExtracted, version, outputPath })

  const parts = normalizeVersion(version, suffixes)
  const content = renderDescriptor({ version, parts, strings })

  log('Generated version file content:')
  log(content)
  progress?.({ event: GenerateEvent.DescriptorRendered, version, outputPath })

  const result: GenerateResult = {
    version,
    found: extracted.found,
    parts,
    content,
    inputPath,
    outputPath,
    written: false,
  }

  if (dryRun) {
    logStep(symbols.info, `Skipped writing ${outputName}`, true, log)
    return result
  }

  sink.write(outputPath, content)

  log(`Content of ${outputName}:`)
  log(source.read(outputPath))
  log(colors.green(`${symbols.success} ${outputName} generated successfully`))
  progress?.({ event: GenerateEvent.DescriptorWritten, version, outputPath })

  return { ...result, written: true }
}
