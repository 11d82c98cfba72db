import { homedir } from 'node:os'
import { join } from 'node:path'
import { readFile } from 'node:fs/promises'
import { appConfigSchema, type AppConfigInput } from './config-types.js'

const CONFIG_DIR = join(homedir(), '.config', 'tally')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export const getConfigPath = () => CONFIG_FILE

export type ConfigFileResult =
  | { status: 'loaded'; config: AppConfigInput; path: string }
  | { status: 'missing'; path: string }
  | { status: 'invalid'; path: string; reason: string }

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT'

/**
 * Reads the JSON config file. A missing file is normal; unreadable or
 * invalid content is reported back instead of thrown so the caller can
 * warn and fall back to defaults.
 */
export const loadConfigFile = async (path = CONFIG_FILE): Promise<ConfigFileResult> => {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (err) {
    if (isMissingFile(err)) return { status: 'missing', path }
    return { status: 'invalid', path, reason: err instanceof Error ? err.message : String(err) }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    return { status: 'invalid', path, reason: err instanceof Error ? err.message : String(err) }
  }

  const result = appConfigSchema.safeParse(parsed)
  if (!result.success) {
    const fields = result.error.issues.map((i) => i.path.join('.')).join(', ')
    return { status: 'invalid', path, reason: `Invalid fields: ${fields}` }
  }

  return { status: 'loaded', config: result.data, path }
}
