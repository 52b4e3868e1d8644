import { loadConfig as loadConfigFile } from './config-service.js'
import { appConfigSchema, type AppConfig } from './config-types.js'

/**
 * Environment variable names for CLI automation
 */
export const ENV_VARS = {
  LEDGER: 'REVENUE_LEDGER',
  DEFAULT_UNIT: 'REVENUE_DEFAULT_UNIT',
  LOG_LEVEL: 'LOG_LEVEL',
} as const

export interface LoadConfigResult {
  config: AppConfig | null
  source: 'env' | 'file' | 'mixed' | null
  missing: string[]
}

/**
 * Load config from environment variables, with fallback to config file.
 * Env vars take priority over config file values.
 */
export const loadConfigWithEnv = async (
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadConfigResult> => {
  const fileConfig = await loadConfigFile(configPath)

  const envLedger = env[ENV_VARS.LEDGER]
  const envUnit = env[ENV_VARS.DEFAULT_UNIT]
  const envLogLevel = env[ENV_VARS.LOG_LEVEL]

  const ledgerPath = envLedger || fileConfig?.ledgerPath
  if (!ledgerPath) {
    return { config: null, source: null, missing: [ENV_VARS.LEDGER] }
  }

  const fromEnv = [envLedger, envUnit, envLogLevel].some(Boolean)
  let source: 'env' | 'file' | 'mixed'
  if (!fileConfig) {
    source = 'env'
  } else {
    source = fromEnv ? 'mixed' : 'file'
  }

  // Validate with zod schema
  const config = appConfigSchema.parse({
    ledgerPath,
    defaultUnit: envUnit || fileConfig?.defaultUnit,
    logLevel: envLogLevel || fileConfig?.logLevel,
  })

  return { config, source, missing: [] }
}
