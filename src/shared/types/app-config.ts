// SPDX-License-Identifier: GPL-2.0-or-later

export type OutputFormat = 'svg' | 'pdf'

export interface AppConfig {
  format: OutputFormat
  /** Empty means the default directory under the home folder */
  logDir: string
  debug: boolean
}

export const SETTABLE_APP_CONFIG_KEYS: ReadonlySet<keyof AppConfig> = new Set([
  'format',
  'logDir',
  'debug',
])

export const DEFAULT_APP_CONFIG: AppConfig = {
  format: 'svg',
  logDir: '',
  debug: false,
}
