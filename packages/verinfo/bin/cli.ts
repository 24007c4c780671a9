#!/usr/bin/env tsx
import type { GenerateProgress, VerinfoConfig } from '../src/types'
import process from 'node:process'
import { CAC } from 'cac'
import { version } from '../package.json'
import { defaultConfig as verinfoDefaults, loadVerinfoConfig } from '../src/config'
import { generate } from '../src/generate'
import { ExitCode, GenerateEvent } from '../src/types'
import type { CLIValue } from '../src/utils'
import { colors, logStep, parseList, symbols } from '../src/utils'

const cli = new CAC('verinfo')

// Define CLI options interface to match CAC's naming conventions
interface CLIOptions {
  output?: CLIValue
  identifier?: CLIValue
  suffix?: CLIValue | CLIValue[]
  strict?: boolean
  dryRun?: boolean
  quiet?: boolean
  cwd?: CLIValue
}

/**
 * Progress callback for CLI output
 */
function progress({ event, outputPath }: GenerateProgress): void {
  if (event === GenerateEvent.DescriptorWritten) {
    logStep(symbols.package, colors.gray(`Wrote ${outputPath}`))
  }
}

/**
 * Error handler
 */
function errorHandler(error: Error): never {
  let message = error.message || String(error)

  if (process.env.CI || process.env.DEBUG) {
    message += `\n\n${error.stack || ''}`
  }

  console.error(colors.red(`${symbols.error} ${message}`))

  if (message.includes('Version file not found')
    || message.includes('Could not determine')
    || message.includes('Unknown option')) {
    process.exit(ExitCode.InvalidArgument)
  }

  process.exit(ExitCode.FatalError)
}

/**
 * Parse and prepare config from CLI options
 */
async function prepareConfig(input: CLIValue | undefined, options: CLIOptions): Promise<VerinfoConfig> {
  // Only pass CLI arguments that were explicitly provided, let config file fill in the rest
  const cliOverrides: Partial<VerinfoConfig> = {}

  if (input !== undefined)
    cliOverrides.input = String(input)
  if (options.output !== undefined)
    cliOverrides.output = String(options.output)
  if (options.identifier !== undefined)
    cliOverrides.identifier = String(options.identifier)

  const suffixes = parseList(options.suffix)
  if (suffixes !== undefined)
    cliOverrides.suffixes = suffixes

  if (options.strict === true)
    cliOverrides.strict = true
  if (options.dryRun !== undefined)
    cliOverrides.dryRun = options.dryRun
  if (options.quiet !== undefined)
    cliOverrides.quiet = options.quiet

  return loadVerinfoConfig(cliOverrides)
}

// Main command (default)
cli
  .command('[input]', 'Write a version resource file from a version declaration')
  .option('-o, --output <file>', `Descriptor file to write (default: ${verinfoDefaults.output})`)
  .option('-i, --identifier <name>', `Name the version is assigned to (default: ${verinfoDefaults.identifier})`)
  .option('--suffix <token>', 'Suffix token to strip before normalizing (repeatable, comma-separated; write --suffix=<token> when it starts with "-")')
  .option('--strict', 'Fail when no version can be found instead of writing "Unknown"')
  .option('--dry-run', 'Show the descriptor without writing it')
  .option('-q, --quiet', 'Quiet mode')
  .option('--cwd <dir>', 'Directory input and output paths are resolved against')
  .example('verinfo')
  .example('verinfo src/__version__.py -o build/version.txt')
  .example('verinfo --suffix=-beta --strict')
  .action(async (input: CLIValue | undefined, options: CLIOptions) => {
    try {
      const config = await prepareConfig(input, options)
      generate({
        ...config,
        cwd: options.cwd === undefined ? undefined : String(options.cwd),
        progress: config.quiet ? undefined : progress,
      })
    }
    catch (error) {
      errorHandler(error instanceof Error ? error : new Error(String(error)))
    }
  })

// Version command
cli
  .command('version', 'Show the version of verinfo')
  .action(() => {
    console.log(version)
  })

// Setup global error handlers
process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:')
  errorHandler(error)
})
process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:')
  errorHandler(reason instanceof Error ? reason : new Error(String(reason)))
})

cli.version(version)
cli.help()
cli.parse()
