// SPDX-License-Identifier: GPL-2.0-or-later
// CLI configuration backed by an optional JSON file

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import {
  DEFAULT_APP_CONFIG,
  SETTABLE_APP_CONFIG_KEYS,
  type AppConfig,
  type OutputFormat,
} from '../shared/types/app-config'

export const DEFAULT_CONFIG_FILE = 'keymap-render.config.json'

export interface LoadedAppConfig {
  config: AppConfig
  /** Values that were present but ignored */
  warnings: string[]
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'svg' || value === 'pdf'
}

type Validators = { [K in keyof AppConfig]: (value: unknown) => value is AppConfig[K] }

const VALIDATORS: Validators = {
  format: isOutputFormat,
  logDir: (value): value is string => typeof value === 'string',
  debug: (value): value is boolean => typeof value === 'boolean',
}

function isSettableKey(key: string): key is keyof AppConfig {
  return SETTABLE_APP_CONFIG_KEYS.has(key as keyof AppConfig)
}

function assign<K extends keyof AppConfig>(config: AppConfig, key: K, value: unknown): boolean {
  const validate: (value: unknown) => value is AppConfig[K] = VALIDATORS[key]
  if (!validate(value)) return false
  config[key] = value
  return true
}

/** Overlay raw JSON data on the defaults, keeping defaults for bad values */
export function mergeAppConfig(data: unknown): LoadedAppConfig {
  const config: AppConfig = { ...DEFAULT_APP_CONFIG }
  const warnings: string[] = []

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    warnings.push('Config file must contain a JSON object, using defaults')
    return { config, warnings }
  }

  for (const [key, value] of Object.entries(data)) {
    if (!isSettableKey(key)) {
      warnings.push(`Unknown config key "${key}" ignored`)
    } else if (!assign(config, key, value)) {
      warnings.push(`Invalid value for config key "${key}", using ${JSON.stringify(DEFAULT_APP_CONFIG[key])}`)
    }
  }
  return { config, warnings }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Load configuration from `filePath`. A missing file yields the defaults
 * unless `required` is set; unparsable JSON always throws.
 */
export async function loadAppConfig(
  filePath = DEFAULT_CONFIG_FILE,
  required = false,
): Promise<LoadedAppConfig> {
  let raw: string
  try {
    raw = await readFile(resolve(filePath), 'utf-8')
  } catch (err) {
    if (!required && isMissingFile(err)) {
      return { config: { ...DEFAULT_APP_CONFIG }, warnings: [] }
    }
    throw err
  }

  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new Error(`Invalid config file ${filePath}: ${reason}`)
  }
  return mergeAppConfig(data)
}
