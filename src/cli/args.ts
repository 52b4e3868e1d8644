import { Command, InvalidArgumentError, Option } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import { GRANULARITIES, type Granularity } from '../periods/index.js'

const packageSchema = z.object({ version: z.string() })

// Resolved from the bundled dist/cli.js
export const getVersion = (): string => {
  try {
    const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json')
    return packageSchema.parse(JSON.parse(readFileSync(pkgPath, 'utf-8'))).version
  } catch {
    return '0.0.0'
  }
}

export const OUTPUT_FORMATS = ['json', 'text'] as const

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

export interface GlobalOptions {
  format: OutputFormat
  quiet: boolean
  config?: string
}

export interface ReportOptions extends GlobalOptions {
  /** Instant the report is computed at (now when absent) */
  atTime?: Date
  /** Provider slugs to restrict the report to (all providers when empty) */
  providers: string[]
  period: Granularity
}

export type CommandAction = { command: 'report'; options: ReportOptions }

const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/

/**
 * Parses an ISO-8601 instant. Values without an offset are read as UTC.
 *
 * @example
 * parseAtTime('2024-01-01')            // => 2024-01-01T00:00:00.000Z
 * parseAtTime('2024-01-01T08:30')      // => 2024-01-01T08:30:00.000Z
 * parseAtTime('2024-01-01T08:30+02:00') // => 2024-01-01T06:30:00.000Z
 */
export const parseAtTime = (value: string): Date => {
  const trimmed = value.trim()
  const normalized =
    DATE_ONLY.test(trimmed) || OFFSET_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`
  const date = new Date(normalized)
  if (!/^\d{4}-\d{2}-\d{2}/.test(trimmed) || Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Expected an ISO-8601 date or time, got "${value}".`)
  }
  return date
}

const collect = (value: string, previous: string[]): string[] => [...previous, value]

const reportOptionsSchema = z.object({
  format: z.enum(OUTPUT_FORMATS),
  quiet: z.boolean(),
  config: z.string().optional(),
  atTime: z.date().optional(),
  provider: z.array(z.string()),
  period: z.enum(GRANULARITIES),
})

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  const program = new Command()
    .name('revenue-digest')
    .description('Period-over-period revenue reports for billing providers')
    .version(getVersion())

  // Parse with exitOverride to prevent process.exit; set before subcommands so they inherit it
  program.exitOverride()

  program
    .command('report', { isDefault: true })
    .description('Compare the last two periods and the same period a year earlier')
    .addOption(
      new Option('-f, --format <format>', 'Output format: json or text')
        .choices(OUTPUT_FORMATS)
        .default('json')
    )
    .option('-q, --quiet', 'Suppress progress messages', false)
    .option('--config <path>', 'Path to config file')
    .option('--at-time <datetime>', 'Time at which the report runs (ISO-8601, default: now)', parseAtTime)
    .option('--provider <slug>', 'Provider to generate a report for (repeatable)', collect, [])
    .addOption(
      new Option('-p, --period <period>', 'Period to compare')
        .choices(GRANULARITIES)
        .default('weekly')
    )
    .action((options: unknown) => {
      const { provider, ...rest } = reportOptionsSchema.parse(options)
      result = { command: 'report', options: { ...rest, providers: provider } }
    })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err && typeof err === 'object' && 'code' in err) {
      const { code } = err
      if (code === 'commander.helpDisplayed' || code === 'commander.version') {
        return null
      }
    }
    throw err
  }

  return result
}
