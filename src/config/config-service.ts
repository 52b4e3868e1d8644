import { homedir } from 'node:os'
import { join } from 'node:path'
import { readFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { configFileSchema, type ConfigFile } from './config-types.js'

const CONFIG_DIR = join(homedir(), '.config', 'revenue-digest')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export const getConfigPath = () => CONFIG_FILE

/**
 * Reads the config file. A missing file is not an error; a malformed one is.
 */
export const loadConfig = async (path = CONFIG_FILE): Promise<ConfigFile | null> => {
  if (!existsSync(path)) return null

  const content = await readFile(path, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new Error(`Config file ${path} is not valid JSON`, { cause: error })
  }
  return configFileSchema.parse(parsed)
}
