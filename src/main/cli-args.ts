// SPDX-License-Identifier: GPL-2.0-or-later

import type { OutputFormat } from '../shared/types/app-config'
import { isOutputFormat } from './app-config'

export const USAGE = `Usage: keymap-render <keymap.yaml> [options]

Options:
  -o, --output <file>    Write to a file instead of stdout (required for pdf)
  -f, --format <format>  svg or pdf (default from config, or the output extension)
  -c, --config <file>    Config file (default: keymap-render.config.json)
  -h, --help             Show this help`

export class UsageError extends Error {
  override name = 'UsageError'
}

export interface CliArgs {
  input?: string
  output?: string
  format?: OutputFormat
  config?: string
  help: boolean
}

const VALUE_FLAGS: Record<string, 'output' | 'format' | 'config'> = {
  '-o': 'output',
  '--output': 'output',
  '-f': 'format',
  '--format': 'format',
  '-c': 'config',
  '--config': 'config',
}

/** Parse arguments after the executable and script path */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '-h' || arg === '--help') {
      args.help = true
      continue
    }

    // --flag=value form
    const eq = arg.indexOf('=')
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg
    const target = VALUE_FLAGS[flag]
    if (target) {
      const value = flag !== arg ? arg.slice(eq + 1) : argv[++i]
      if (value === undefined || value === '') {
        throw new UsageError(`Missing value for ${flag}`)
      }
      if (target === 'format') {
        if (!isOutputFormat(value)) throw new UsageError(`Unknown format "${value}", expected svg or pdf`)
        args.format = value
      } else {
        args[target] = value
      }
      continue
    }

    if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option ${arg}`)
    }
    if (args.input !== undefined) {
      throw new UsageError(`Unexpected argument ${arg}`)
    }
    args.input = arg
  }

  return args
}
