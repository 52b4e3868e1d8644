import { z } from 'zod'

export const TRANSACTION_KINDS = ['sale', 'payment', 'refund'] as const

export const organizationSchema = z.object({
  slug: z.string().min(1),
  fullName: z.string().default(''),
  isProvider: z.boolean().default(false),
  defaultTimezone: z.string().optional(),
  email: z.string().email().optional(),
})

export type Organization = z.infer<typeof organizationSchema>

export const ledgerTransactionSchema = z.object({
  id: z.string().min(1),
  createdAt: z.coerce.date(),
  /** Organization receiving the revenue */
  provider: z.string().min(1),
  /** Organization paying for it */
  customer: z.string().min(1),
  kind: z.enum(TRANSACTION_KINDS),
  /** Amount in the unit's minor denomination (cents) */
  amount: z.number().int(),
  unit: z.string().min(1).default('usd'),
})

export type LedgerTransaction = z.infer<typeof ledgerTransactionSchema>

export const ledgerSchema = z.object({
  organizations: z.array(organizationSchema).default([]),
  transactions: z.array(ledgerTransactionSchema).default([]),
})

export type Ledger = z.infer<typeof ledgerSchema>
