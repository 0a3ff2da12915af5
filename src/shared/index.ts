// SPDX-License-Identifier: GPL-2.0-or-later

export type { Combo, Key, KeyBlock, KeyEmphasis, KeymapDocument, KeyRow, Layer, Layout } from './types/keymap'
export type { Board, DrawPrimitive, RectPrimitive, StyleClass, TextPrimitive } from './types/draw'
export * from './keymap/constants'
export { KeymapParseError, KeymapShapeError } from './keymap/errors'
export { collectShapeViolations, totalColumns, totalKeyCount } from './keymap/shape'
export { comboKeyOrigin, keysEqual, renderBlock, renderCombo, renderKey, renderRow } from './keymap/geometry'
export { boardDimensions, renderBoard, renderLayer } from './keymap/board'
export { parseKeymapDocument } from './keymap/schema'
export { parseKeymapText } from './keymap/load'
export { renderBoardSvg } from './render/svg-export'
export { generateBoardPdf } from './render/pdf-export'
