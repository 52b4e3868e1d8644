import { readFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import type { Provider } from '../reporting/types.js'
import { ledgerSchema, type Ledger } from './ledger-types.js'

export class LedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LedgerError'
  }
}

/**
 * Parses and validates ledger JSON.
 */
export const parseLedger = (content: string, source = 'ledger'): Ledger => {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new LedgerError(`${source} is not valid JSON`, { cause: error })
  }

  const result = ledgerSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new LedgerError(`${source} is invalid: ${issues}`, { cause: result.error })
  }
  return result.data
}

/**
 * Reads the ledger file at `path`.
 *
 * @example
 * const ledger = await loadLedger('./ledger.json')
 * const providers = listProviders(ledger, ['acme'])
 */
export const loadLedger = async (path: string): Promise<Ledger> => {
  if (!existsSync(path)) {
    throw new LedgerError(`Ledger file not found: ${path}`)
  }
  const content = await readFile(path, 'utf-8')
  return parseLedger(content, path)
}

/**
 * Organizations flagged as providers, optionally restricted to `slugs`.
 * Ledger order is kept.
 */
export const listProviders = (ledger: Ledger, slugs?: readonly string[]): Provider[] =>
  ledger.organizations
    .filter((org) => org.isProvider)
    .filter((org) => !slugs || slugs.length === 0 || slugs.includes(org.slug))
    .map((org) => ({
      slug: org.slug,
      fullName: org.fullName,
      defaultTimezone: org.defaultTimezone,
      email: org.email,
    }))
