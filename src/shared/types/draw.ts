// SPDX-License-Identifier: GPL-2.0-or-later

export type StyleClass = 'key' | 'held' | 'combo'

export interface RectPrimitive {
  kind: 'rect'
  x: number
  y: number
  width: number
  height: number
  rx: number
  ry: number
  styleClass: StyleClass
}

/** Text anchored at its horizontal and vertical center */
export interface TextPrimitive {
  kind: 'text'
  x: number
  y: number
  text: string
  small: boolean
  bold: boolean
}

export type DrawPrimitive = RectPrimitive | TextPrimitive

export interface Board {
  width: number
  height: number
  primitives: DrawPrimitive[]
}
