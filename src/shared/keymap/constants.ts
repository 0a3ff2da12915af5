// SPDX-License-Identifier: GPL-2.0-or-later
// Drawing units for the keymap board

export const KEY_W = 55
export const KEY_H = 50
export const KEY_RX = 6
export const KEY_RY = 6
export const INNER_PAD_W = 2
export const INNER_PAD_H = 2
export const OUTER_PAD_W = KEY_W / 2
export const OUTER_PAD_H = KEY_H
// One grid cell: key face plus inner padding on both sides
export const KEYSPACE_W = KEY_W + 2 * INNER_PAD_W
export const KEYSPACE_H = KEY_H + 2 * INNER_PAD_H
export const LINE_SPACING = 18
