import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ConfigError} from '../errors.js'

export const CONFIG_FILENAME = '.topojar.yml'

/**
 * Project-level defaults, read from `.topojar.yml`.
 */
export type TopojarConfig = {
  /** Base jar path, relative to the config file's directory */
  base?: string;
  indexUrl?: string;
  systemPackages?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ConfigError(`${CONFIG_FILENAME}: "${key}" must be a string`)
  }

  return value
}

function readBoolean(record: Record<string, unknown>, key: string): boolean | undefined {
  const value = record[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ConfigError(`${CONFIG_FILENAME}: "${key}" must be a boolean`)
  }

  return value
}

export function parseConfig(content: string): TopojarConfig {
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new ConfigError(`${CONFIG_FILENAME} is not valid YAML`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping`)
  }

  const record = parsed
  const config: TopojarConfig = {}

  const base = readString(record, 'base')
  if (base !== undefined) {
    config.base = base
  }

  const indexUrl = readString(record, 'indexUrl')
  if (indexUrl !== undefined) {
    config.indexUrl = indexUrl
  }

  const systemPackages = readBoolean(record, 'systemPackages')
  if (systemPackages !== undefined) {
    config.systemPackages = systemPackages
  }

  return config
}

/**
 * Loads `.topojar.yml` from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<TopojarConfig> {
  let content: string
  try {
    content = await readFile(join(dir, CONFIG_FILENAME), 'utf8')
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {}
    }

    throw error
  }

  return parseConfig(content)
}
