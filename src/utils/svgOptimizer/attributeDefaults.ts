// Default-value table loading

import { z } from 'zod'
import defaultsTable from '../../config/attributeDefaults.json'
import { InvalidOptionError } from '../errors'
import type { AttributeDefaults, PresentationDefault } from './types'

export const AttributeDefaultsSchema = z.object({
  presentation: z.record(
    z.string().min(1),
    z.object({
      default: z.string(),
      inherited: z.boolean(),
    })
  ),
  elements: z.record(z.string().min(1), z.record(z.string().min(1), z.string())),
})

export type AttributeDefaultsInput = z.infer<typeof AttributeDefaultsSchema>

/**
 * Validate a defaults table and resolve it into lookup maps
 */
export function createAttributeDefaults(input: unknown): AttributeDefaults {
  const parsed = AttributeDefaultsSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidOptionError(`Invalid attribute defaults table: ${parsed.error.message}`, {
      cause: parsed.error,
    })
  }

  const presentation = new Map<string, PresentationDefault>()
  for (const [name, entry] of Object.entries(parsed.data.presentation)) {
    presentation.set(name, Object.freeze({ value: entry.default, inherited: entry.inherited }))
  }

  const elements = new Map<string, ReadonlyMap<string, string>>()
  for (const [tag, attributes] of Object.entries(parsed.data.elements)) {
    elements.set(tag, new Map(Object.entries(attributes)))
  }

  return Object.freeze({ presentation, elements })
}

export const DEFAULT_ATTRIBUTE_DEFAULTS = createAttributeDefaults(defaultsTable)
