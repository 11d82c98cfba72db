import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { parseArgs } from '../args.js'

describe('parseArgs', () => {
  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('runs the expense tracker when no command is given', () => {
    expect(parseArgs(['node', 'tally'])).toEqual({
      command: 'expenses',
      options: { quiet: false },
    })
  })

  it('parses expense options', () => {
    expect(parseArgs(['node', 'tally', 'expenses', '-q', '--config', '/tmp/tally.json'])).toEqual({
      command: 'expenses',
      options: { quiet: true, config: '/tmp/tally.json' },
    })
  })

  it('parses the sales command with ranking size and currency', () => {
    expect(parseArgs(['node', 'tally', 'sales', '--top', '2', '--currency', 'TK'])).toEqual({
      command: 'sales',
      options: { quiet: false, top: 2, currency: 'TK' },
    })
  })

  it('returns null after showing help', () => {
    expect(parseArgs(['node', 'tally', '--help'])).toBeNull()
    expect(process.stdout.write).toHaveBeenCalled()
  })

  it('returns null after showing subcommand help', () => {
    expect(parseArgs(['node', 'tally', 'sales', '--help'])).toBeNull()
  })

  it('returns null after showing the version', () => {
    expect(parseArgs(['node', 'tally', '--version'])).toBeNull()
    expect(process.stdout.write).toHaveBeenCalled()
  })

  it('rejects a non-positive ranking size', () => {
    expect(() => parseArgs(['node', 'tally', 'sales', '--top', '0'])).toThrow('Expected a positive integer.')
  })

  it('rejects a fractional ranking size', () => {
    expect(() => parseArgs(['node', 'tally', '--top', '1.5'])).toThrow('Expected a positive integer.')
  })
})
