// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect } from 'vitest'
import type { Key, Layout } from '../../types/keymap'
import type { DrawPrimitive, RectPrimitive } from '../../types/draw'
import {
  comboKeyOrigin,
  keysEqual,
  renderBlock,
  renderCombo,
  renderKey,
  renderRow,
} from '../geometry'
import { KeymapShapeError } from '../errors'

function key(tap: string, overrides: Partial<Key> = {}): Key {
  return { tap, hold: '', emphasis: 'none', ...overrides }
}

function makeLayout(overrides: Partial<Layout> = {}): Layout {
  return { split: true, rows: 1, columns: 3, thumbs: null, ...overrides }
}

function rects(primitives: DrawPrimitive[]): RectPrimitive[] {
  return primitives.filter((p): p is RectPrimitive => p.kind === 'rect')
}

describe('keysEqual', () => {
  it('compares every field', () => {
    expect(keysEqual(key('A'), key('A'))).toBe(true)
    expect(keysEqual(key('A'), key('A', { hold: 'Ctl' }))).toBe(false)
    expect(keysEqual(key('A'), key('A', { emphasis: 'held' }))).toBe(false)
    expect(keysEqual(key('A'), key('B'))).toBe(false)
  })
})

describe('renderKey', () => {
  it('draws a single key with a centered label', () => {
    expect(renderKey(0, 0, key('A'))).toEqual([
      { kind: 'rect', x: 2, y: 2, width: 55, height: 50, rx: 6, ry: 6, styleClass: 'key' },
      { kind: 'text', x: 29.5, y: 27, text: 'A', small: false, bold: false },
    ])
  })

  it('offsets the face by the inner padding', () => {
    const [face] = renderKey(10, 20, key('A'))
    expect(face).toMatchObject({ x: 12, y: 22 })
  })

  it('spans two keyspaces when doubled', () => {
    const [face, label] = renderKey(0, 0, key('Space'), true)
    expect(face).toMatchObject({ width: 114, height: 50 })
    expect(label).toMatchObject({ x: 59, y: 27, text: 'Space' })
  })

  it('stacks words vertically around the middle', () => {
    const labels = renderKey(0, 0, key('Caps  Word')).slice(1)
    expect(labels).toEqual([
      { kind: 'text', x: 29.5, y: 18, text: 'Caps', small: false, bold: false },
      { kind: 'text', x: 29.5, y: 36, text: 'Word', small: false, bold: false },
    ])
  })

  it('adds a small hold label near the bottom', () => {
    const primitives = renderKey(0, 0, key('Z', { hold: 'Ctl' }))
    expect(primitives[2]).toEqual({ kind: 'text', x: 29.5, y: 45, text: 'Ctl', small: true, bold: false })
  })

  it('uses the held style class for emphasized keys', () => {
    const [face] = renderKey(0, 0, key('Fn', { emphasis: 'held' }))
    expect(face).toMatchObject({ styleClass: 'held' })
  })

  it('draws only the face for an empty key', () => {
    expect(renderKey(0, 0, key(''))).toHaveLength(1)
  })
})

describe('renderRow', () => {
  const layout = makeLayout()

  it('merges equal neighbours into one doubled key', () => {
    const faces = rects(renderRow(layout, 0, 0, [key('A'), key('A'), key('B')]))
    expect(faces.map((r) => [r.x, r.width])).toEqual([[2, 114], [120, 55]])
  })

  it('does not reuse a merged key for the next pair', () => {
    const faces = rects(renderRow(layout, 0, 0, [key('A'), key('A'), key('A')]))
    expect(faces.map((r) => [r.x, r.width])).toEqual([[2, 114], [120, 55]])
  })

  it('never merges absent slots', () => {
    const primitives = renderRow(layout, 0, 0, [null, null, key('B')])
    expect(rects(primitives).map((r) => r.x)).toEqual([2, 61, 120])
    expect(primitives.filter((p) => p.kind === 'text')).toHaveLength(1)
  })

  it('keeps keys apart when only the hold differs', () => {
    const faces = rects(renderRow(layout, 0, 0, [key('A'), key('A', { hold: 'Alt' }), key('B')]))
    expect(faces).toHaveLength(3)
  })

  it('rejects a row of the wrong length', () => {
    expect(() => renderRow(layout, 0, 0, [key('A'), key('B')])).toThrow(KeymapShapeError)
    expect(() => renderRow(layout, 0, 0, [key('A'), key('B')])).toThrow('Row has 2 keys, expected 3')
  })

  it('checks thumb rows against the thumb count', () => {
    const thumbs = makeLayout({ thumbs: 2 })
    expect(rects(renderRow(thumbs, 0, 0, [key('Esc'), key('Spc')], true))).toHaveLength(2)
    expect(() => renderRow(thumbs, 0, 0, [key('A'), key('B'), key('C')], true)).toThrow(
      'Thumb row has 3 keys, expected 2',
    )
  })
})

describe('renderBlock', () => {
  it('advances one keyspace per row', () => {
    const layout = makeLayout({ rows: 2, columns: 1 })
    const faces = rects(renderBlock(layout, 0, 0, [[key('A')], [key('B')]]))
    expect(faces.map((r) => r.y)).toEqual([2, 56])
  })

  it('rejects a block with the wrong number of rows', () => {
    const layout = makeLayout({ rows: 2, columns: 1 })
    expect(() => renderBlock(layout, 0, 0, [[key('A')]])).toThrow('Block has 1 rows, expected 2')
  })
})

describe('comboKeyOrigin', () => {
  const split = makeLayout({ rows: 2, columns: 3 })

  it('maps left-half positions without a gap', () => {
    expect(comboKeyOrigin(split, 0, 0, 0)).toEqual({ x: 0, y: 0 })
    expect(comboKeyOrigin(split, 0, 0, 8)).toEqual({ x: 118, y: 54 })
  })

  it('adds the split gap for right-half columns', () => {
    expect(comboKeyOrigin(split, 0, 0, 3)).toEqual({ x: 204.5, y: 0 })
    expect(comboKeyOrigin(split, 10, 20, 11)).toEqual({ x: 10 + 5 * 59 + 27.5, y: 74 })
  })

  it('wraps at the column count for non-split layouts', () => {
    const flat = makeLayout({ split: false, rows: 2, columns: 3 })
    expect(comboKeyOrigin(flat, 0, 0, 4)).toEqual({ x: 59, y: 54 })
  })
})

describe('renderCombo', () => {
  const layout = makeLayout({ columns: 1 })

  it('centers the marker between keys across the split gap', () => {
    expect(renderCombo(layout, 0, 0, { positions: [0, 1], key: key('Esc') })).toEqual([
      { kind: 'rect', x: 59, y: 14.5, width: 27.5, height: 25, rx: 6, ry: 6, styleClass: 'combo' },
      { kind: 'text', x: 72.75, y: 27, text: 'Esc', small: true, bold: false },
    ])
  })

  it('puts a combo on a single key when both positions match', () => {
    const [marker] = renderCombo(layout, 0, 0, { positions: [0, 0], key: key('X') })
    expect(marker).toMatchObject({ x: 15.75, y: 14.5 })
  })

  it('places the marker center at the mean of the key origins', () => {
    const grid = makeLayout({ rows: 3, columns: 4 })
    const [marker] = renderCombo(grid, 5, 7, { positions: [1, 22], key: key('Z') })
    const a = comboKeyOrigin(grid, 5, 7, 1)
    const b = comboKeyOrigin(grid, 5, 7, 22)
    expect(marker.x + 27.5 / 2).toBeCloseTo((a.x + b.x) / 2 + 59 / 2)
    expect(marker.y + 25 / 2).toBeCloseTo((a.y + b.y) / 2 + 54 / 2)
  })

  it('requires exactly two positions', () => {
    expect(() => renderCombo(layout, 0, 0, { positions: [0], key: key('X') })).toThrow(
      'Combo must have exactly two positions, got 1',
    )
  })
})
