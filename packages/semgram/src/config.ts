import type { CLIOptions, SemgramConfig, SemgramOptions } from './types.js'
import { loadConfig } from 'bunfig'

export const defaultConfig: SemgramConfig = {
  json: false,
  colors: true,
  verbose: false,
  showSource: true,
}

let cachedConfig: SemgramConfig | null = null

async function getConfig(): Promise<SemgramConfig> {
  if (cachedConfig)
    return cachedConfig

  const loaded = await loadConfig({
    name: 'semgram',
    defaultConfig,
  })

  // Merge with defaults to ensure completeness
  cachedConfig = { ...defaultConfig, ...loaded }
  return cachedConfig
}

/**
 * Load semgram configuration with overrides
 */
export async function loadSemgramConfig(overrides?: SemgramOptions): Promise<SemgramConfig> {
  const base = await getConfig()
  return { ...defaultConfig, ...base, ...overrides }
}

/**
 * Forget the cached config file contents
 */
export function resetConfigCache(): void {
  cachedConfig = null
}

/**
 * Only pass CLI arguments that were explicitly provided, let the config file fill in the rest
 */
export function toOverrides(options: CLIOptions): SemgramOptions {
  const overrides: SemgramOptions = {}
  if (options.json !== undefined)
    overrides.json = options.json
  if (options.color === false)
    overrides.colors = false
  if (options.verbose !== undefined)
    overrides.verbose = options.verbose
  return overrides
}

/**
 * Define configuration helper for TypeScript config files
 */
export function defineConfig(config: SemgramOptions): SemgramOptions {
  return config
}
