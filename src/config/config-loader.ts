import { loadConfigFile, getConfigPath } from './config-service.js'
import { appConfigSchema, type AppConfig, type AppConfigInput } from './config-types.js'

/**
 * Environment variable names
 */
export const ENV_VARS = {
  TALLY_CURRENCY: 'TALLY_CURRENCY',
  TALLY_TOP_COUNT: 'TALLY_TOP_COUNT',
  TALLY_DEFAULT_DATE: 'TALLY_DEFAULT_DATE',
} as const

export interface ConfigOverrides {
  configPath?: string
  currency?: string
  topCount?: number
}

export interface LoadConfigResult {
  config: AppConfig
  source: 'defaults' | 'file' | 'env' | 'mixed'
  warnings: string[]
}

type Env = Record<string, string | undefined>

const parseTopCount = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined
  return Number(value)
}

/**
 * Load config from defaults, the config file, environment variables and
 * CLI overrides, later sources winning. Throws a ZodError when a merged
 * value is out of range.
 */
export const loadConfigWithEnv = async (
  overrides: ConfigOverrides = {},
  env: Env = process.env
): Promise<LoadConfigResult> => {
  const warnings: string[] = []
  const fileResult = await loadConfigFile(overrides.configPath ?? getConfigPath())

  let fileConfig: AppConfigInput = {}
  if (fileResult.status === 'loaded') {
    fileConfig = fileResult.config
  } else if (fileResult.status === 'invalid') {
    warnings.push(`Ignoring config file ${fileResult.path}: ${fileResult.reason}`)
  } else if (overrides.configPath) {
    warnings.push(`Config file not found: ${fileResult.path}`)
  }

  const envCurrency = env[ENV_VARS.TALLY_CURRENCY] || undefined
  const envTopCount = parseTopCount(env[ENV_VARS.TALLY_TOP_COUNT])
  const envDefaultDate = env[ENV_VARS.TALLY_DEFAULT_DATE] || undefined
  const usedEnv = envCurrency !== undefined || envTopCount !== undefined || envDefaultDate !== undefined

  const merged: AppConfigInput = {
    display: {
      ...fileConfig.display,
      currencySymbol: overrides.currency ?? envCurrency ?? fileConfig.display?.currencySymbol,
      topCount: overrides.topCount ?? envTopCount ?? fileConfig.display?.topCount,
    },
    expenses: {
      ...fileConfig.expenses,
      defaultDate: envDefaultDate ?? fileConfig.expenses?.defaultDate,
    },
    sales: {
      ...fileConfig.sales,
      currencySymbol: overrides.currency ?? envCurrency ?? fileConfig.sales?.currencySymbol,
      topCount: overrides.topCount ?? envTopCount ?? fileConfig.sales?.topCount,
    },
  }

  const config = appConfigSchema.parse(merged)

  let source: LoadConfigResult['source'] = 'defaults'
  if (fileResult.status === 'loaded') {
    source = usedEnv ? 'mixed' : 'file'
  } else if (usedEnv) {
    source = 'env'
  }

  return { config, source, warnings }
}
