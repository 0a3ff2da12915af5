// SPDX-License-Identifier: GPL-2.0-or-later
// Runtime validation of keymap documents into the typed model

import { z } from 'zod'
import type { Key, KeymapDocument, Layer, Layout } from '../types/keymap'
import { KeymapParseError } from './errors'
import { collectShapeViolations, formatViolation } from './shape'

// Numeric and boolean scalars are labels too ("1", "true")
const labelSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String)

const keyObjectSchema = z.object({
  tap: labelSchema,
  hold: labelSchema.default(''),
  type: z.enum(['', 'none', 'held']).default(''),
})

/** A key is either a bare label or a { tap, hold, type } mapping */
export const keySchema = z.union([
  labelSchema.transform((tap): Key => ({ tap, hold: '', emphasis: 'none' })),
  keyObjectSchema.transform(
    (raw): Key => ({ tap: raw.tap, hold: raw.hold, emphasis: raw.type === 'held' ? 'held' : 'none' }),
  ),
])

const keyRowSchema = z.array(keySchema.nullable())
const keyBlockSchema = z.array(keyRowSchema)

const comboSchema = z.object({
  positions: z.array(z.number().int()),
  key: keySchema,
})

export const layoutSchema = z
  .object({
    split: z.boolean().default(true),
    rows: z.number().int().min(1),
    columns: z.number().int().min(1),
    thumbs: z.number().int().min(0).nullish(),
  })
  // 0 means no thumb rows
  .transform((raw): Layout => ({ ...raw, thumbs: raw.thumbs || null }))

export const layerSchema = z
  .object({
    left: keyBlockSchema.optional(),
    keys: keyBlockSchema.optional(),
    right: keyBlockSchema.nullish(),
    left_thumbs: keyRowSchema.nullish(),
    leftThumbs: keyRowSchema.nullish(),
    right_thumbs: keyRowSchema.nullish(),
    rightThumbs: keyRowSchema.nullish(),
    combos: z.array(comboSchema).nullish(),
  })
  .transform((raw, ctx): Layer => {
    const left = raw.left ?? raw.keys
    if (!left) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Layer needs a "left" (or "keys") block' })
      return z.NEVER
    }
    return {
      left,
      right: raw.right ?? undefined,
      leftThumbs: raw.left_thumbs ?? raw.leftThumbs ?? undefined,
      rightThumbs: raw.right_thumbs ?? raw.rightThumbs ?? undefined,
      combos: raw.combos ?? [],
    }
  })

export const keymapDocumentSchema = z.object({
  layout: layoutSchema,
  layers: z.map(z.string(), layerSchema),
})

function layerNames(data: unknown): string[] {
  if (typeof data !== 'object' || data === null || !('layers' in data)) return []
  const { layers } = data
  return layers instanceof Map ? Array.from(layers.keys(), String) : []
}

/** zod reports map entries as [index, 'key' | 'value']; show the layer name instead */
function issuePath(path: readonly (string | number)[], names: readonly string[]): (string | number)[] {
  const [head, index, part, ...rest] = path
  if (head === 'layers' && typeof index === 'number' && (part === 'key' || part === 'value')) {
    return [head, names[index] ?? index, ...rest]
  }
  return [...path]
}

function formatIssue(issue: z.ZodIssue, names: readonly string[]): string {
  if (issue.path.length === 0) return issue.message
  return `${issuePath(issue.path, names).join('.')}: ${issue.message}`
}

/**
 * Validate already-parsed document data. `layers` must be a Map so that
 * layer order survives integer-like layer names. Cross-entity checks run
 * only once every field has the right shape.
 */
export function parseKeymapDocument(data: unknown): KeymapDocument {
  const result = keymapDocumentSchema.safeParse(data)
  if (!result.success) {
    const names = layerNames(data)
    throw new KeymapParseError(result.error.issues.map((issue) => formatIssue(issue, names)))
  }

  const { layout, layers } = result.data
  const violations = collectShapeViolations(layout, layers)
  if (violations.length > 0) {
    throw new KeymapParseError(violations.map(formatViolation))
  }
  return { layout, layers }
}
