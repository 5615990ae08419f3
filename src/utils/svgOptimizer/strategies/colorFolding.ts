// Step 3: color shorthand folding (lossless)

import type { SvgElement } from '../../../types/svg'
import { mapAttributes, rewriteValues, transformDocument } from '../treeUtils'
import { COLOR_ATTRIBUTES } from '../types'

const FOLDABLE_HEX = /^#([0-9a-f])\1([0-9a-f])\2([0-9a-f])\3$/i

function isColorAttribute(name: string): boolean {
  return (COLOR_ATTRIBUTES as readonly string[]).includes(name)
}

/**
 * #aabbcc -> #abc when both digits of every channel match
 */
export function foldHexColor(value: string): string {
  const match = value.trim().match(FOLDABLE_HEX)
  if (!match) return value
  return `#${match[1]}${match[2]}${match[3]}`.toLowerCase()
}

/**
 * Fold colors in color-valued attributes only; ids and references such as
 * url(#aabbcc) are left alone.
 */
export function foldColors(root: SvgElement): SvgElement {
  return mapAttributes(root, element =>
    rewriteValues(element.attributes, (name, value) => (isColorAttribute(name) ? foldHexColor(value) : value))
  )
}

export function foldColorShorthand(document: string): string {
  return transformDocument(document, foldColors)
}
