// SPDX-License-Identifier: GPL-2.0-or-later
// Key, row, block and combo geometry in board drawing units

import type { Combo, Key, KeyBlock, KeyRow, Layout } from '../types/keymap'
import type { DrawPrimitive, RectPrimitive, StyleClass, TextPrimitive } from '../types/draw'
import {
  INNER_PAD_H,
  INNER_PAD_W,
  KEY_H,
  KEY_RX,
  KEY_RY,
  KEY_W,
  KEYSPACE_H,
  KEYSPACE_W,
  LINE_SPACING,
  OUTER_PAD_W,
} from './constants'
import { KeymapShapeError } from './errors'
import { totalColumns } from './shape'

export const EMPTY_KEY: Key = { tap: '', hold: '', emphasis: 'none' }

const EMPHASIS_CLASS: Record<Key['emphasis'], StyleClass> = {
  none: 'key',
  held: 'held',
}

export function rect(
  x: number,
  y: number,
  width: number,
  height: number,
  styleClass: StyleClass,
): RectPrimitive {
  return { kind: 'rect', x, y, width, height, rx: KEY_RX, ry: KEY_RY, styleClass }
}

export function text(
  x: number,
  y: number,
  label: string,
  options: { small?: boolean; bold?: boolean } = {},
): TextPrimitive {
  return {
    kind: 'text',
    x,
    y,
    text: label,
    small: options.small ?? false,
    bold: options.bold ?? false,
  }
}

/** Structural equality used to detect keys spanning two positions */
export function keysEqual(a: Key, b: Key): boolean {
  return a.tap === b.tap && a.hold === b.hold && a.emphasis === b.emphasis
}

/**
 * Draw one key whose keyspace starts at (x, y). A doubled key covers two
 * adjacent keyspaces, including the padding between them.
 */
export function renderKey(x: number, y: number, key: Key, doubled = false): DrawPrimitive[] {
  const width = doubled ? 2 * KEY_W + 2 * INNER_PAD_W : KEY_W
  const primitives: DrawPrimitive[] = [
    rect(x + INNER_PAD_W, y + INNER_PAD_H, width, KEY_H, EMPHASIS_CLASS[key.emphasis]),
  ]

  const words = key.tap.split(/\s+/).filter((word) => word !== '')
  const centerX = x + (doubled ? KEYSPACE_W : KEYSPACE_W / 2)
  let wordY = y + (KEYSPACE_H - (words.length - 1) * LINE_SPACING) / 2
  for (const word of words) {
    primitives.push(text(centerX, wordY, word))
    wordY += LINE_SPACING
  }

  if (key.hold) {
    primitives.push(text(centerX, y + KEYSPACE_H - LINE_SPACING / 2, key.hold, { small: true }))
  }
  return primitives
}

/** Lay out a row left to right, merging equal neighbours into doubled keys */
export function renderRow(
  layout: Layout,
  x: number,
  y: number,
  row: KeyRow,
  isThumbRow = false,
): DrawPrimitive[] {
  const expected = isThumbRow ? layout.thumbs : layout.columns
  if (row.length !== expected) {
    const kind = isThumbRow ? 'Thumb row' : 'Row'
    throw new KeymapShapeError(`${kind} has ${row.length} keys, expected ${expected}`)
  }

  const primitives: DrawPrimitive[] = []
  let cursor = x
  let i = 0
  while (i < row.length) {
    const key = row[i]
    const next = i + 1 < row.length ? row[i + 1] : null
    if (key && next && keysEqual(key, next)) {
      primitives.push(...renderKey(cursor, y, key, true))
      cursor += 2 * KEYSPACE_W
      i += 2
    } else {
      primitives.push(...renderKey(cursor, y, key ?? EMPTY_KEY))
      cursor += KEYSPACE_W
      i += 1
    }
  }
  return primitives
}

export function renderBlock(layout: Layout, x: number, y: number, block: KeyBlock): DrawPrimitive[] {
  if (block.length !== layout.rows) {
    throw new KeymapShapeError(`Block has ${block.length} rows, expected ${layout.rows}`)
  }
  return block.flatMap((row, r) => renderRow(layout, x, y + r * KEYSPACE_H, row))
}

/**
 * Keyspace origin of a flattened grid position relative to a layer origin.
 * Positions past the left half are shifted by the gap between the halves.
 */
export function comboKeyOrigin(
  layout: Layout,
  x: number,
  y: number,
  position: number,
): { x: number; y: number } {
  const cols = totalColumns(layout)
  const col = position % cols
  const row = Math.floor(position / cols)
  const gap = layout.split && col >= layout.columns ? OUTER_PAD_W : 0
  return { x: x + col * KEYSPACE_W + gap, y: y + row * KEYSPACE_H }
}

/** Draw a combo marker centred between the keys it references */
export function renderCombo(layout: Layout, x: number, y: number, combo: Combo): DrawPrimitive[] {
  if (combo.positions.length !== 2) {
    throw new KeymapShapeError(`Combo must have exactly two positions, got ${combo.positions.length}`)
  }
  const origins = combo.positions.map((pos) => comboKeyOrigin(layout, x, y, pos))
  const midX = origins.reduce((sum, o) => sum + o.x, 0) / origins.length
  const midY = origins.reduce((sum, o) => sum + o.y, 0) / origins.length

  return [
    rect(midX + INNER_PAD_W + KEY_W / 4, midY + INNER_PAD_H + KEY_H / 4, KEY_W / 2, KEY_H / 2, 'combo'),
    text(midX + KEYSPACE_W / 2, midY + INNER_PAD_H + KEY_H / 2, combo.key.tap, { small: true }),
  ]
}
