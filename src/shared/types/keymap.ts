// SPDX-License-Identifier: GPL-2.0-or-later
// Validated keymap document model consumed by the geometry engine

export type KeyEmphasis = 'none' | 'held'

/** One physical key's labels on one layer */
export interface Key {
  tap: string
  hold: string
  emphasis: KeyEmphasis
}

/** null marks an absent slot, drawn as a blank key */
export type KeyRow = readonly (Key | null)[]

export type KeyBlock = readonly KeyRow[]

export interface Layout {
  split: boolean
  rows: number
  columns: number
  thumbs: number | null
}

export interface Combo {
  /** Indices into the flattened non-thumb grid (row-major, left then right) */
  positions: readonly number[]
  key: Key
}

export interface Layer {
  left: KeyBlock
  right?: KeyBlock
  leftThumbs?: KeyRow
  rightThumbs?: KeyRow
  combos: readonly Combo[]
}

export interface KeymapDocument {
  layout: Layout
  /** Insertion order is the top-to-bottom stacking order */
  layers: ReadonlyMap<string, Layer>
}
