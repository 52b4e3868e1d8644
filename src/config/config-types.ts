import { z } from 'zod'
import { LOG_LEVELS } from '../shared/logger.js'

export const DEFAULT_UNIT = 'usd'

export const appConfigSchema = z.object({
  /** Path to the JSON ledger the report aggregates */
  ledgerPath: z.string().min(1),
  /** Unit used when no aggregated transaction carries one */
  defaultUnit: z
    .string()
    .min(1)
    .transform((unit) => unit.toLowerCase())
    .default(DEFAULT_UNIT),
  logLevel: z.enum(LOG_LEVELS).default('info'),
})

export type AppConfig = z.infer<typeof appConfigSchema>

/** Config file contents; every field may be supplied by the environment instead */
export const configFileSchema = appConfigSchema.partial()

export type ConfigFile = z.infer<typeof configFileSchema>
