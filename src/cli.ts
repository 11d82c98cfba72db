#!/usr/bin/env node
import { ZodError } from 'zod'
import { parseArgs, type CommandAction } from './cli/args.js'
import { runExpenseShell } from './cli/shells/expense-shell.js'
import { runSalesShell } from './cli/shells/sales-shell.js'
import { loadConfigWithEnv, type LoadConfigResult } from './config/config-loader.js'
import { createExpenseManager } from './aggregation/expense-manager.js'
import { createSalesAnalytics } from './aggregation/sales-analytics.js'
import { createCatalog } from './catalog/catalog.js'
import { createFormatter, type OutputFormatter } from './shared/output.js'

const runCommand = async (action: CommandAction): Promise<void> => {
  // Annotated so `formatter.error` narrows as never
  const formatter: OutputFormatter = createFormatter(action.options.quiet)

  let loaded: LoadConfigResult
  try {
    loaded = await loadConfigWithEnv({
      configPath: action.options.config,
      currency: action.options.currency,
      topCount: action.options.top,
    })
  } catch (err) {
    if (!(err instanceof ZodError)) throw err
    const fields = err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n')
    formatter.error('Invalid configuration', fields)
  }

  const { config, source, warnings } = loaded
  for (const warning of warnings) {
    formatter.warn(warning)
  }
  formatter.progress(`Using ${source} configuration`)

  switch (action.command) {
    case 'expenses':
      await runExpenseShell(createExpenseManager(), {
        currencySymbol: config.display.currencySymbol,
        topCount: config.display.topCount,
        categories: config.expenses.categories,
        defaultDate: config.expenses.defaultDate,
      })
      break
    case 'sales':
      await runSalesShell(createSalesAnalytics(), createCatalog(), {
        currencySymbol: config.sales.currencySymbol,
        topCount: config.sales.topCount,
      })
      break
  }
}

const main = async () => {
  try {
    const action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCommand(action)
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }
}

void main()
