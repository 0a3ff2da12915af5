// SPDX-License-Identifier: GPL-2.0-or-later
// Best-effort rotating file logger for the CLI (~/.keymap-render/logs/ by default)

import { homedir } from 'node:os'
import { join } from 'node:path'
import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from 'node:fs'

const MAX_FILE_SIZE = 5 * 1024 * 1024 // 5 MB
const MAX_GENERATIONS = 5 // keymap-render-0.log is current, 4 is oldest

export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

export interface LoggerOptions {
  dir?: string
  debug?: boolean
}

interface LogSink {
  dir: string
  debug: boolean
  dirReady: boolean
  // Set after the first failed write; the render carries on without a log
  broken: boolean
}

const sink: LogSink = { dir: '', debug: false, dirReady: false, broken: false }

export function configureLogger(options: LoggerOptions): void {
  sink.dir = options.dir ?? ''
  sink.debug = options.debug ?? false
  sink.dirReady = false
  sink.broken = false
}

export function getLogPath(): string {
  return sink.dir || join(homedir(), '.keymap-render', 'logs')
}

function generationPath(generation: number): string {
  return join(getLogPath(), `keymap-render-${generation}.log`)
}

function currentSize(path: string): number {
  try {
    return statSync(path).size
  } catch {
    return 0
  }
}

/** Shift every generation up by one; the oldest is overwritten */
function rotateIfFull(current: string): void {
  if (currentSize(current) < MAX_FILE_SIZE) return
  for (let generation = MAX_GENERATIONS - 1; generation > 0; generation--) {
    const newer = generationPath(generation - 1)
    if (existsSync(newer)) {
      renameSync(newer, generationPath(generation))
    }
  }
}

function writeLine(line: string): void {
  if (!sink.dirReady) {
    mkdirSync(getLogPath(), { recursive: true })
    sink.dirReady = true
  }
  const current = generationPath(0)
  rotateIfFull(current)
  appendFileSync(current, line, 'utf-8')
}

export function log(level: LogLevel, message: string): void {
  if (sink.broken) return
  try {
    writeLine(`[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}\n`)
  } catch {
    sink.broken = true
  }
}

export function isDebugEnabled(): boolean {
  return sink.debug || Boolean(process.env.KEYMAP_RENDER_DEBUG)
}

export function logDebug(message: string): void {
  if (isDebugEnabled()) log('debug', message)
}
