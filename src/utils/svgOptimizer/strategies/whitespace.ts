// Step 1: formatting removal (lossless)

import { transformDocument } from '../treeUtils'

/**
 * Re-emit compactly. Comments, the XML declaration and indentation between
 * elements are not part of the parsed tree, so they disappear; whitespace
 * inside text content survives as a single space.
 */
export function normalizeWhitespace(document: string): string {
  return transformDocument(document, root => root)
}
