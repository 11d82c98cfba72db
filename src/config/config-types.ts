import { z } from 'zod'

export const DEFAULT_EXPENSE_CATEGORIES = [
  'Food',
  'Transport',
  'Shopping',
  'Bills',
  'Entertainment',
  'Health',
  'Other',
] as const

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')

export const appConfigSchema = z.object({
  display: z
    .object({
      currencySymbol: z.string().min(1).default('$'),
      topCount: z.number().int().min(1).max(50).default(5),
    })
    .default({}),
  expenses: z
    .object({
      categories: z
        .array(z.string().trim().min(1))
        .min(1)
        .default([...DEFAULT_EXPENSE_CATEGORIES]),
      defaultDate: isoDateSchema.optional(),
    })
    .default({}),
  sales: z
    .object({
      currencySymbol: z.string().min(1).default('TK'),
      topCount: z.number().int().min(1).max(50).default(3),
    })
    .default({}),
})

export type AppConfig = z.infer<typeof appConfigSchema>
export type AppConfigInput = z.input<typeof appConfigSchema>
