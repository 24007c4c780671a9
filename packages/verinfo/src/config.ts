import type { VerinfoConfig, VerinfoOptions } from './types'
import { loadConfig } from 'bunfig'
import { defaultConfig } from './defaults'

export { defaultConfig }

/**
 * Load verinfo configuration with overrides
 */
let cachedConfig: VerinfoConfig | null = null

async function getConfig(): Promise<VerinfoConfig> {
  if (cachedConfig)
    return cachedConfig

  const loaded = await loadConfig<VerinfoConfig>({
    name: 'verinfo',
    defaultConfig,
  })

  // Merge with defaults to ensure completeness
  cachedConfig = { ...defaultConfig, ...loaded }
  return cachedConfig
}

export async function loadVerinfoConfig(overrides?: VerinfoOptions): Promise<VerinfoConfig> {
  const base = await getConfig()
  return { ...defaultConfig, ...base, ...overrides }
}

/**
 * Forget the cached config file so the next load reads it again
 */
export function resetConfigCache(): void {
  cachedConfig = null
}

/**
 * Define configuration helper for TypeScript config files
 */
export function defineConfig(config: VerinfoOptions): VerinfoOptions {
  return config
}
