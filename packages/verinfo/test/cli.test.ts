import { spawnSync } from 'node:child_process'
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import process from 'node:process'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { renderDescriptor } from '../src/descriptor'

const packageDir = fileURLToPath(new URL('..', import.meta.url))
const cliPath = join(packageDir, 'bin', 'cli.ts')

// Workspace installs hoist tsx to the root; a standalone install keeps it beside the package
const tsxBin = [
  join(packageDir, 'node_modules', '.bin', 'tsx'),
  join(packageDir, '..', '..', 'node_modules', '.bin', 'tsx'),
].find(candidate => existsSync(candidate)) ?? 'tsx'

describe('CLI Integration Tests', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = join(tmpdir(), `verinfo-cli-test-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`)
    mkdirSync(tempDir, { recursive: true })
  })

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  function runCli(args: string[]) {
    const { CI: _ci, DEBUG: _debug, ...env } = process.env
    const result = spawnSync(tsxBin, [cliPath, ...args], {
      cwd: tempDir,
      encoding: 'utf-8',
      env,
    })
    return { status: result.status, stdout: result.stdout, stderr: result.stderr }
  }

  function writeDeclaration(content: string, name = '__version__.py'): void {
    writeFileSync(join(tempDir, name), content)
  }

  it('should write version.txt with the defaults', () => {
    writeDeclaration('__version__ = \'1.2.3\'\n')

    const result = runCli([])

    expect(result.status).toBe(0)
    expect(readFileSync(join(tempDir, 'version.txt'), 'utf-8'))
      .toBe(renderDescriptor({ version: '1.2.3', parts: ['1', '2', '3', '0'] }))
    expect(result.stdout).toContain('Extracted version: 1.2.3')
    expect(result.stdout).toContain('Content of version.txt:')
  })

  it('should honor the input argument, output, identifier and suffix list', () => {
    mkdirSync(join(tempDir, 'out'))
    writeDeclaration('APP_VERSION = \'1.2.3-beta\'\n', 'app.py')

    const result = runCli(['app.py', '-o', 'out/res.txt', '-i', 'APP_VERSION', '--suffix=-beta,-rc'])

    expect(result.status).toBe(0)
    expect(readFileSync(join(tempDir, 'out', 'res.txt'), 'utf-8'))
      .toBe(renderDescriptor({ version: '1.2.3-beta', parts: ['1', '2', '3', '0'] }))
    expect(existsSync(join(tempDir, 'version.txt'))).toBe(false)
  })

  it('should exit with 1 and write nothing in strict mode when no version is declared', () => {
    writeDeclaration('name = \'agent\'\n')

    const result = runCli(['--strict'])

    expect(result.status).toBe(1)
    expect(result.stderr).toContain('Could not determine version from')
    expect(existsSync(join(tempDir, 'version.txt'))).toBe(false)
  })

  it('should exit with 1 when the input file is missing', () => {
    const result = runCli([])

    expect(result.status).toBe(1)
    expect(result.stderr).toContain('Version file not found')
    expect(result.stderr).toContain('__version__.py')
    expect(existsSync(join(tempDir, 'version.txt'))).toBe(false)
  })

  it('should write nothing in dry run mode', () => {
    writeDeclaration('__version__ = \'1.2.3\'\n')

    const result = runCli(['--dry-run'])

    expect(result.status).toBe(0)
    expect(result.stdout).toContain('[DRY RUN] Skipped writing version.txt')
    expect(existsSync(join(tempDir, 'version.txt'))).toBe(false)
  })

  it('should print nothing in quiet mode', () => {
    writeDeclaration('__version__ = \'1.2.3\'\n')

    const result = runCli(['-q'])

    expect(result.status).toBe(0)
    expect(result.stdout.trim()).toBe('')
    expect(existsSync(join(tempDir, 'version.txt'))).toBe(true)
  })

  it('should read the output path from verinfo.config.ts in the working directory', () => {
    writeDeclaration('__version__ = \'1.2.3\'\n')
    writeFileSync(join(tempDir, 'verinfo.config.ts'), 'export default { output: \'custom.txt\' }\n')

    const result = runCli(['-q'])

    expect(result.status).toBe(0)
    expect(existsSync(join(tempDir, 'custom.txt'))).toBe(true)
    expect(existsSync(join(tempDir, 'version.txt'))).toBe(false)
  })

  it('should keep numeric-looking option values as strings', () => {
    writeDeclaration('2024 = \'1.0.0\'\n')

    const result = runCli(['-q', '-o', '123', '-i', '2024'])

    expect(result.status).toBe(0)
    expect(readFileSync(join(tempDir, '123'), 'utf-8'))
      .toBe(renderDescriptor({ version: '1.0.0', parts: ['1', '0', '0', '0'] }))
  })

  it('should print the package version', () => {
    const { version } = JSON.parse(readFileSync(join(packageDir, 'package.json'), 'utf-8'))

    const result = runCli(['version'])

    expect(result.status).toBe(0)
    expect(result.stdout.trim()).toBe(version)
  })
})
