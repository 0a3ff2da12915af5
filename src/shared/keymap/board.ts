// SPDX-License-Identifier: GPL-2.0-or-later
// Compose every layer of a keymap into one vertically stacked board

import type { KeymapDocument, Layer, Layout } from '../types/keymap'
import type { Board, DrawPrimitive } from '../types/draw'
import { KEY_H, KEYSPACE_H, KEYSPACE_W, OUTER_PAD_H, OUTER_PAD_W } from './constants'
import { KeymapShapeError } from './errors'
import { renderBlock, renderCombo, renderRow, text } from './geometry'
import { collectShapeViolations, formatViolation } from './shape'

export interface BoardDimensions {
  blockWidth: number
  blockHeight: number
  layerWidth: number
  boardWidth: number
  boardHeight: number
}

export function boardDimensions(layout: Layout, layerCount: number): BoardDimensions {
  const blockWidth = layout.columns * KEYSPACE_W
  const blockHeight = (layout.rows + (layout.thumbs ? 1 : 0)) * KEYSPACE_H
  const layerWidth = (layout.split ? 2 : 1) * blockWidth + OUTER_PAD_W
  return {
    blockWidth,
    blockHeight,
    layerWidth,
    boardWidth: layerWidth + 2 * OUTER_PAD_W,
    boardHeight: layerCount * blockHeight + (layerCount + 1) * OUTER_PAD_H,
  }
}

export function renderLayer(
  layout: Layout,
  x: number,
  y: number,
  name: string,
  layer: Layer,
): DrawPrimitive[] {
  const blockWidth = layout.columns * KEYSPACE_W
  const rightX = x + blockWidth + OUTER_PAD_W
  const primitives: DrawPrimitive[] = [text(x, y - KEY_H / 2, `${name}:`, { bold: true })]

  primitives.push(...renderBlock(layout, x, y, layer.left))
  if (layout.split) {
    if (!layer.right) {
      throw new KeymapShapeError(`Layer "${name}" is missing its right block`)
    }
    primitives.push(...renderBlock(layout, rightX, y, layer.right))
  }

  if (layout.thumbs) {
    if (!layer.leftThumbs || !layer.rightThumbs) {
      throw new KeymapShapeError(`Layer "${name}" needs both thumb rows when thumbs are configured`)
    }
    const thumbY = y + layout.rows * KEYSPACE_H
    // Both clusters hug the gap between the halves
    const leftThumbX = x + (layout.columns - layout.thumbs) * KEYSPACE_W
    primitives.push(...renderRow(layout, leftThumbX, thumbY, layer.leftThumbs, true))
    primitives.push(...renderRow(layout, rightX, thumbY, layer.rightThumbs, true))
  }

  for (const combo of layer.combos) {
    primitives.push(...renderCombo(layout, x, y, combo))
  }
  return primitives
}

/**
 * Lay out the whole keymap. Throws KeymapShapeError before producing any
 * output when the document violates a layout invariant.
 */
export function renderBoard(document: KeymapDocument): Board {
  const { layout, layers } = document
  const violations = collectShapeViolations(layout, layers)
  if (violations.length > 0) {
    throw new KeymapShapeError(violations.map(formatViolation).join('\n'))
  }

  const dims = boardDimensions(layout, layers.size)
  const primitives: DrawPrimitive[] = []
  const x = OUTER_PAD_W
  let y = 0
  for (const [name, layer] of layers) {
    y += OUTER_PAD_H
    primitives.push(...renderLayer(layout, x, y, name, layer))
    y += dims.blockHeight
  }

  return { width: dims.boardWidth, height: dims.boardHeight, primitives }
}
