import { promises as fs } from 'fs'
import path from 'path'
import { ConfigError } from './errors.js'
import { isConfigObject, type ConfigObject } from './merge.js'

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Load a JSON config file. The top level must be an object.
 */
export async function loadConfigFile(filePath: string): Promise<ConfigObject> {
  const content = await fs.readFile(filePath, 'utf-8')

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new ConfigError(
      `Config file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    )
  }

  if (!isConfigObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`, filePath, parsed)
  }

  return parsed
}

/**
 * Save a JSON config file.
 */
export async function saveConfigFile(filePath: string, config: ConfigObject): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
  await fs.writeFile(filePath, JSON.stringify(config, null, 2), 'utf-8')
}
