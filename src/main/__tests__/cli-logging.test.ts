// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { join } from 'node:path'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { run, EXIT_FAILURE, EXIT_OK, type CliIo } from '../cli'

let testDir: string
let configPath: string
let stdout: string
let stderr: string
let io: CliIo

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'cli-logging-test-'))
  // A regular file where the log directory should be
  const blocker = join(testDir, 'blocker')
  await writeFile(blocker, '')
  configPath = join(testDir, 'config.json')
  await writeFile(configPath, JSON.stringify({ logDir: join(blocker, 'logs') }))
  stdout = ''
  stderr = ''
  io = {
    stdout: (text) => { stdout += text },
    stderr: (text) => { stderr += text },
  }
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

describe('run with an unwritable log directory', () => {
  it('still renders a valid keymap', async () => {
    const input = join(testDir, 'keymap.yaml')
    await writeFile(input, 'layout: { split: false, rows: 1, columns: 1 }\nlayers:\n  Base: { keys: [[A]] }\n')
    expect(await run([input, '-c', configPath], io)).toBe(EXIT_OK)
    expect(stdout.split('\n')[0]).toBe(
      '<svg width="141.5" height="154" viewBox="0 0 141.5 154" xmlns="http://www.w3.org/2000/svg">',
    )
    expect(stderr).toBe('')
  })

  it('still reports render failures', async () => {
    const input = join(testDir, 'keymap.yaml')
    await writeFile(input, 'layout: { split: false, rows: 1, columns: 2 }\nlayers:\n  Base: { keys: [[A]] }\n')
    expect(await run([input, '-c', configPath], io)).toBe(EXIT_FAILURE)
    expect(stderr).toBe('error: Row has 1 keys, expected 2\n')
  })
})
