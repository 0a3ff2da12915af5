// SPDX-License-Identifier: GPL-2.0-or-later
// Command-line flow: config, load, render, write

import { basename } from 'node:path'
import { renderBoard } from '../shared/keymap/board'
import { KeymapParseError } from '../shared/keymap/errors'
import { generateBoardPdf } from '../shared/render/pdf-export'
import { renderBoardSvg } from '../shared/render/svg-export'
import { DEFAULT_CONFIG_FILE, loadAppConfig } from './app-config'
import { parseCliArgs, USAGE, UsageError, type CliArgs } from './cli-args'
import { formatFromPath, loadKeymapFile, writeOutputFile } from './file-io'
import { configureLogger, log, logDebug } from './logger'

export interface CliIo {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
}

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

function failureLines(err: unknown): string[] {
  if (err instanceof KeymapParseError) return err.issues
  if (err instanceof Error) return err.message.split('\n')
  return [String(err)]
}

async function render(args: CliArgs & { input: string }, io: CliIo): Promise<number> {
  const { config, warnings } = await loadAppConfig(
    args.config ?? DEFAULT_CONFIG_FILE,
    args.config !== undefined,
  )
  configureLogger({ dir: config.logDir, debug: config.debug })
  for (const warning of warnings) {
    log('warn', warning)
  }

  const format = args.format ?? (args.output ? formatFromPath(args.output) : undefined) ?? config.format
  if (format === 'pdf' && !args.output) {
    throw new UsageError('PDF output needs --output <file>')
  }

  log('info', `Rendering ${args.input} as ${format}`)
  const document = await loadKeymapFile(args.input)
  const board = renderBoard(document)
  logDebug(
    `Board ${board.width}x${board.height}: ${document.layers.size} layers, ${board.primitives.length} primitives`,
  )

  if (format === 'pdf' && args.output) {
    const base64 = generateBoardPdf(board, { title: basename(args.input) })
    await writeOutputFile(args.output, Buffer.from(base64, 'base64'))
  } else if (args.output) {
    await writeOutputFile(args.output, renderBoardSvg(board))
  } else {
    io.stdout(renderBoardSvg(board))
  }

  log('info', `Rendered ${args.input}${args.output ? ` to ${args.output}` : ''}`)
  return EXIT_OK
}

export async function run(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  let args: CliArgs
  try {
    args = parseCliArgs(argv)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    io.stderr(`${err.message}\n\n${USAGE}\n`)
    return EXIT_USAGE
  }

  if (args.help) {
    io.stdout(`${USAGE}\n`)
    return EXIT_OK
  }
  const { input } = args
  if (!input) {
    io.stderr(`Missing keymap file\n\n${USAGE}\n`)
    return EXIT_USAGE
  }

  try {
    return await render({ ...args, input }, io)
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`${err.message}\n\n${USAGE}\n`)
      return EXIT_USAGE
    }
    for (const line of failureLines(err)) {
      io.stderr(`error: ${line}\n`)
      log('error', line)
    }
    return EXIT_FAILURE
  }
}
