import { Command, InvalidArgumentError } from 'commander'
import { readFileSync, existsSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'

const getVersion = (): string => {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli/args.ts in development, dist/cli.js once bundled
  const candidates = [join(here, '..', '..', 'package.json'), join(here, '..', 'package.json')]
  const pkgPath = candidates.find((path) => existsSync(path))
  if (!pkgPath) return '0.0.0'

  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'))
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return '0.0.0'
}

export interface ShellOptions {
  quiet: boolean
  config?: string
  currency?: string
  top?: number
}

export type ShellCommand = 'expenses' | 'sales'

export type CommandAction =
  | { command: 'expenses'; options: ShellOptions }
  | { command: 'sales'; options: ShellOptions }

const parseTop = (value: string): number => {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return n
}

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  // Set before subcommands are added so they inherit it
  const program = new Command()
    .name('tally')
    .description('Track expenses and analyze sales from the terminal')
    .version(getVersion())
    .exitOverride()

  // Options shared by both shells
  const addShellOptions = (cmd: Command) => {
    return cmd
      .option('-q, --quiet', 'Suppress progress messages', false)
      .option('--config <path>', 'Path to config file')
      .option('--currency <symbol>', 'Currency symbol for amounts')
      .option('-t, --top <number>', 'How many entries to rank', parseTop)
  }

  addShellOptions(
    program
      .command('expenses', { isDefault: true })
      .description('Interactive personal expense tracker (default)')
  ).action((options: ShellOptions) => {
    result = { command: 'expenses', options }
  })

  addShellOptions(
    program
      .command('sales')
      .description('Interactive sales analytics report')
  ).action((options: ShellOptions) => {
    result = { command: 'sales', options }
  })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err && typeof err === 'object' && 'code' in err) {
      const { code } = err
      if (code === 'commander.helpDisplayed' || code === 'commander.version' || code === 'commander.help') {
        return null
      }
    }
    throw err
  }

  return result
}
