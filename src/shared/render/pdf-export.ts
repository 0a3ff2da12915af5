// SPDX-License-Identifier: GPL-2.0-or-later
// Render a composed board into a single-page PDF

import { jsPDF } from 'jspdf'
import type { Board, RectPrimitive, StyleClass, TextPrimitive } from '../types/draw'
import { BOARD_PALETTE } from './svg-export'

const BASE_FONT_SIZE = 14
const SMALL_FONT_SCALE = 0.8
const KEY_LINE_WIDTH = 1

const FILL_BY_CLASS: Record<StyleClass, string> = {
  key: BOARD_PALETTE.keyFill,
  held: BOARD_PALETTE.heldFill,
  combo: BOARD_PALETTE.comboFill,
}

export interface PdfExportOptions {
  /** Stored in the document properties */
  title?: string
}

export function arrayBufferToBase64(buffer: ArrayBufferLike): string {
  const bytes = new Uint8Array(buffer)
  const chunks: string[] = []
  const CHUNK_SIZE = 8192
  for (let i = 0; i < bytes.length; i += CHUNK_SIZE) {
    chunks.push(String.fromCharCode(...bytes.subarray(i, i + CHUNK_SIZE)))
  }
  return btoa(chunks.join(''))
}

/**
 * Strip non-Latin1 characters: jsPDF's built-in Courier only supports
 * WinAnsiEncoding (U+0020..U+00FF).
 */
export function sanitizeLabel(text: string): string {
  return text.replace(/[^\x20-\xFF]/g, '')
}

function drawRect(doc: jsPDF, r: RectPrimitive): void {
  doc.setFillColor(FILL_BY_CLASS[r.styleClass])
  doc.roundedRect(r.x, r.y, r.width, r.height, r.rx, r.ry, 'FD')
}

function drawText(doc: jsPDF, t: TextPrimitive): void {
  const label = sanitizeLabel(t.text)
  if (!label.trim()) return
  doc.setFont('courier', t.bold ? 'bold' : 'normal')
  doc.setFontSize(t.small ? BASE_FONT_SIZE * SMALL_FONT_SCALE : BASE_FONT_SIZE)
  doc.text(label, t.x, t.y, { align: 'center', baseline: 'middle' })
}

/** Returns the PDF bytes as base64 */
export function generateBoardPdf(board: Board, options: PdfExportOptions = {}): string {
  const doc = new jsPDF({
    // jsPDF swaps the format dimensions when they contradict the orientation
    orientation: board.width > board.height ? 'landscape' : 'portrait',
    unit: 'pt',
    format: [board.width, board.height],
  })
  if (options.title) {
    doc.setProperties({ title: options.title })
  }

  doc.setDrawColor(BOARD_PALETTE.keyStroke)
  doc.setTextColor(BOARD_PALETTE.text)
  doc.setLineWidth(KEY_LINE_WIDTH)

  for (const primitive of board.primitives) {
    if (primitive.kind === 'rect') {
      drawRect(doc, primitive)
    } else {
      drawText(doc, primitive)
    }
  }

  return arrayBufferToBase64(doc.output('arraybuffer'))
}
