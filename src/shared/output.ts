export interface OutputFormatter {
  /** Output error to stderr and exit with code 1 */
  error(message: string, details?: unknown): never
  /** Output progress message to stderr (skipped in quiet mode) */
  progress(message: string): void
  /** Output warning to stderr */
  warn(message: string): void
}

/**
 * Create an output formatter honoring the quiet setting
 */
export const createFormatter = (quiet: boolean): OutputFormatter => ({
  error: (message: string, details?: unknown): never => {
    console.error(`Error: ${message}`)
    if (details) {
      console.error(details)
    }
    process.exit(1)
  },
  progress: (message: string) => {
    if (!quiet) {
      process.stderr.write(`${message}\n`)
    }
  },
  warn: (message: string) => {
    process.stderr.write(`Warning: ${message}\n`)
  },
})

/**
 * Format an amount with a currency symbol. Symbols made of letters
 * (e.g. "TK") go after the number, others before it.
 *
 * @example
 * formatMoney(12.5) // => '$12.50'
 * formatMoney(-3, '$') // => '-$3.00'
 * formatMoney(60, 'TK') // => '60.00 TK'
 */
export const formatMoney = (amount: number, symbol = '$'): string => {
  const fixed = Math.abs(amount).toFixed(2)
  const sign = amount < 0 ? '-' : ''
  if (/^[A-Za-z]+$/.test(symbol)) {
    return `${sign}${fixed} ${symbol}`
  }
  return `${sign}${symbol}${fixed}`
}

/**
 * Create a simple text table from data
 */
export const formatTable = (
  headers: string[],
  rows: string[][],
  columnWidths?: number[]
): string => {
  const widths = columnWidths || headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map(r => (r[i] || '').length))
    return Math.max(h.length, maxRowWidth)
  })

  const formatRow = (cells: string[]) =>
    cells.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ').trimEnd()

  const headerLine = formatRow(headers)
  const separator = widths.map(w => '-'.repeat(w)).join('  ')
  const dataLines = rows.map(formatRow)

  return [headerLine, separator, ...dataLines].join('\n')
}
