import * as p from '@clack/prompts'
import type { Aggregator } from '../../aggregation/types.js'
import { IndexOutOfRangeError, isRecoverableError } from '../../shared/errors.js'

export interface MenuEntry<A extends string> {
  value: A
  label: string
  hint?: string
  run: () => Promise<void>
}

const EXIT = 'exit'

/**
 * Shows the menu until the user picks Exit or cancels (Ctrl+C / Esc).
 * Recoverable engine errors are reported and the loop continues.
 */
export const runMenuLoop = async <A extends string>(
  message: string,
  entries: MenuEntry<A>[],
  farewell: string
): Promise<void> => {
  for (;;) {
    const choice = await p.select({
      message,
      options: [
        ...entries.map((e) => ({ value: e.value, label: e.label, hint: e.hint })),
        { value: EXIT, label: 'Exit' },
      ],
    })

    const entry = p.isCancel(choice) ? undefined : entries.find((e) => e.value === choice)
    if (!entry) {
      p.outro(farewell)
      return
    }

    try {
      await entry.run()
    } catch (err) {
      if (!isRecoverableError(err)) throw err
      p.log.warn(err.message)
    }
  }
}

/**
 * Text prompt that resolves to null when the user cancels. A blank answer
 * comes back from the prompt as undefined and is returned as ''.
 */
export const ask = async (options: Parameters<typeof p.text>[0]): Promise<string | null> => {
  const value = await p.text({ defaultValue: '', ...options })
  if (p.isCancel(value)) {
    p.log.info('Cancelled.')
    return null
  }
  return value ? value.trim() : ''
}

// Validators also see undefined when the prompt is submitted blank
export const validateAmount = (value = ''): string | undefined => {
  const amount = Number(value)
  if (!value.trim() || Number.isNaN(amount)) return 'Please enter a valid number!'
  if (amount <= 0) return 'Amount must be greater than 0!'
  return undefined
}

export const validatePositiveInteger = (value = ''): string | undefined => {
  const n = Number(value)
  if (!value.trim() || !Number.isInteger(n) || n < 1) return 'Please enter a whole number greater than 0!'
  return undefined
}

/**
 * Local calendar date as YYYY-MM-DD.
 */
export const today = (now: Date = new Date()): string => {
  const month = String(now.getMonth() + 1).padStart(2, '0')
  const day = String(now.getDate()).padStart(2, '0')
  return `${now.getFullYear()}-${month}-${day}`
}

/**
 * Removes by position, mapping an out-of-range index to null.
 */
export const removeOrNull = <T>(
  aggregator: Pick<Aggregator<T>, 'removeAt'>,
  position: number
): T | null => {
  try {
    return aggregator.removeAt(position)
  } catch (err) {
    if (err instanceof IndexOutOfRangeError) return null
    throw err
  }
}
