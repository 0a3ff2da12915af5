// SPDX-License-Identifier: GPL-2.0-or-later
// Cross-entity invariants shared by the document loader and the board composer

import type { Layer, Layout } from '../types/keymap'

export interface ShapeViolation {
  path: (string | number)[]
  message: string
}

/** Columns across the whole board, both halves when split */
export function totalColumns(layout: Layout): number {
  return layout.split ? 2 * layout.columns : layout.columns
}

/** Number of addressable non-thumb keys */
export function totalKeyCount(layout: Layout): number {
  return layout.rows * totalColumns(layout)
}

function layoutViolations(layout: Layout): ShapeViolation[] {
  const violations: ShapeViolation[] = []
  if (layout.thumbs === null) return violations
  if (layout.thumbs > layout.columns) {
    violations.push({
      path: ['layout', 'thumbs'],
      message: `Number of thumbs (${layout.thumbs}) should not be greater than columns (${layout.columns})`,
    })
  }
  if (!layout.split) {
    violations.push({
      path: ['layout', 'thumbs'],
      message: 'Thumb rows require a split layout',
    })
  }
  return violations
}

function layerViolations(layout: Layout, name: string, layer: Layer): ShapeViolation[] {
  const violations: ShapeViolation[] = []

  if (
    !layout.split &&
    (layer.right !== undefined || layer.leftThumbs !== undefined || layer.rightThumbs !== undefined)
  ) {
    violations.push({
      path: ['layers', name],
      message: 'Cannot have right or thumb blocks for non-split layouts',
    })
  }

  const total = totalKeyCount(layout)
  layer.combos.forEach((combo, i) => {
    const path = ['layers', name, 'combos', i, 'positions']
    if (combo.positions.length !== 2) {
      violations.push({
        path,
        message: `Combo must have exactly two positions, got ${combo.positions.length}`,
      })
    }
    for (const pos of combo.positions) {
      if (!Number.isInteger(pos) || pos < 0 || pos >= total) {
        violations.push({
          path,
          message: `Combo position ${pos} is out of range for ${total} non-thumb keys`,
        })
      }
    }
  })

  return violations
}

/** Every layout and layer invariant that does not depend on row contents */
export function collectShapeViolations(
  layout: Layout,
  layers: ReadonlyMap<string, Layer>,
): ShapeViolation[] {
  const violations = layoutViolations(layout)
  for (const [name, layer] of layers) {
    violations.push(...layerViolations(layout, name, layer))
  }
  return violations
}

export function formatViolation(violation: ShapeViolation): string {
  return violation.path.length > 0
    ? `${violation.path.join('.')}: ${violation.message}`
    : violation.message
}
