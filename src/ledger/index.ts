export { createLedgerAggregator } from './ledger-aggregator.js'
export { loadLedger, parseLedger, listProviders, LedgerError } from './ledger-store.js'
export {
  ledgerSchema,
  ledgerTransactionSchema,
  organizationSchema,
  TRANSACTION_KINDS,
} from './ledger-types.js'
export type { Ledger, LedgerTransaction, Organization } from './ledger-types.js'
