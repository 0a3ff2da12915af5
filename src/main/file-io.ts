// SPDX-License-Identifier: GPL-2.0-or-later
// Keymap input and rendered output files

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname, extname } from 'node:path'
import { parseKeymapText } from '../shared/keymap/load'
import type { KeymapDocument } from '../shared/types/keymap'
import type { OutputFormat } from '../shared/types/app-config'

export async function loadKeymapFile(filePath: string): Promise<KeymapDocument> {
  const text = await readFile(filePath, 'utf-8')
  return parseKeymapText(text)
}

export async function writeOutputFile(filePath: string, content: string | Buffer): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true })
  if (typeof content === 'string') {
    await writeFile(filePath, content, 'utf-8')
  } else {
    await writeFile(filePath, content)
  }
}

/** Output format implied by a file extension, if any */
export function formatFromPath(filePath: string): OutputFormat | undefined {
  switch (extname(filePath).toLowerCase()) {
    case '.pdf':
      return 'pdf'
    case '.svg':
      return 'svg'
    default:
      return undefined
  }
}
