// SPDX-License-Identifier: GPL-2.0-or-later
// Parse keymap YAML (or JSON) text into a validated document

import { parseDocument, visit } from 'yaml'
import type { KeymapDocument } from '../types/keymap'
import { KeymapParseError } from './errors'
import { parseKeymapDocument } from './schema'

function plain(value: unknown, keepMap = false): unknown {
  if (value instanceof Map) {
    const entries = Array.from(value, ([k, v]): [string, unknown] => [String(k), plain(v)])
    return keepMap ? new Map(entries) : Object.fromEntries(entries)
  }
  if (Array.isArray(value)) return value.map((item) => plain(item))
  return value
}

/** Plain objects everywhere except `layers`, which keeps document order */
function toDocumentData(root: unknown): unknown {
  if (!(root instanceof Map)) return root
  return Object.fromEntries(
    Array.from(root, ([k, v]): [string, unknown] => {
      const key = String(k)
      return [key, plain(v, key === 'layers')]
    }),
  )
}

const INTEGER_SOURCE = /^[-+]?(0o[0-7]+|0x[0-9a-fA-F]+|[0-9]+)$/

/** Spell a YAML float the way it reads as a label: 1.0 stays "1.0", 1e3 becomes "1000.0" */
export function floatLabel(value: number): string {
  if (Number.isNaN(value)) return 'nan'
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf'
  if (Number.isInteger(value) && Math.abs(value) < 1e16) return `${value.toFixed(0)}.0`
  return String(value)
}

export function parseKeymapText(text: string): KeymapDocument {
  const doc = parseDocument(text, { merge: true })
  if (doc.errors.length > 0) {
    throw new KeymapParseError(doc.errors.map((err) => err.message))
  }
  // Floats become labels; counts and positions must be written as integers
  visit(doc, {
    Scalar(_, node) {
      if (typeof node.value === 'number' && node.source !== undefined && !INTEGER_SOURCE.test(node.source)) {
        node.value = floatLabel(node.value)
      }
    },
  })
  const root: unknown = doc.toJS({ mapAsMap: true })
  return parseKeymapDocument(toDocumentData(root))
}
