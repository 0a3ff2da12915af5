// SPDX-License-Identifier: GPL-2.0-or-later
// Serialize a composed board as standalone SVG markup

import type { Board, RectPrimitive, TextPrimitive } from '../types/draw'

export const BOARD_PALETTE = {
  text: '#24292e',
  keyFill: '#f6f8fa',
  keyStroke: '#d6d8da',
  heldFill: '#ffdddd',
  comboFill: '#ccddff',
} as const

export const SVG_STYLE = `
    svg {
        font-family: SFMono-Regular,Consolas,Liberation Mono,Menlo,monospace;
        font-size: 14px;
        font-kerning: normal;
        text-rendering: optimizeLegibility;
        fill: ${BOARD_PALETTE.text};
    }

    rect {
        fill: ${BOARD_PALETTE.keyFill};
        stroke: ${BOARD_PALETTE.keyStroke};
        stroke-width: 1;
    }

    .held {
        fill: ${BOARD_PALETTE.heldFill};
    }

    .combo {
        fill: ${BOARD_PALETTE.comboFill};
    }
`

export function escapeXml(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#x27;')
}

function rectElement(r: RectPrimitive): string {
  // The default key look comes from the rect rule, so it needs no class
  const cls = r.styleClass === 'key' ? '' : ` class="${r.styleClass}"`
  return `<rect rx="${r.rx}" ry="${r.ry}" x="${r.x}" y="${r.y}" width="${r.width}" height="${r.height}"${cls} />`
}

function textElement(t: TextPrimitive): string {
  const small = t.small ? ' font-size="80%"' : ''
  const bold = t.bold ? ' font-weight="bold"' : ''
  return `<text text-anchor="middle" dominant-baseline="middle" x="${t.x}" y="${t.y}"${small}${bold}>${escapeXml(t.text)}</text>`
}

export function renderBoardSvg(board: Board): string {
  const { width, height } = board
  const lines = [
    `<svg width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg">`,
    `<style>${SVG_STYLE}</style>`,
    ...board.primitives.map((p) => (p.kind === 'rect' ? rectElement(p) : textElement(p))),
    '</svg>',
  ]
  return lines.join('\n') + '\n'
}
