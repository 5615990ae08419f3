// Shared tree plumbing for strategies

import type { SvgElement } from '../../types/svg'
import { withChanges } from '../elementModel'
import { parseDocument, serializeElement } from '../svgSerializer'

/** url(#id) with optional quotes; group 2 is the id */
export const LOCAL_URL_REFERENCE = /url\(\s*(['"]?)#([^)'"\s]+)\1\s*\)/g
export const HREF_ATTRIBUTES: readonly string[] = ['href', 'xlink:href']

/**
 * Parse, transform, and re-emit compactly
 */
export function transformDocument(document: string, transform: (root: SvgElement) => SvgElement): string {
  return serializeElement(transform(parseDocument(document)))
}

/**
 * Rebuild a tree bottom-up, rewriting each element's attributes.
 * Unchanged subtrees keep their identity.
 */
export function mapAttributes(
  element: SvgElement,
  rewrite: (element: SvgElement) => ReadonlyMap<string, string>
): SvgElement {
  const children = element.children.map(child =>
    child.kind === 'element' ? mapAttributes(child, rewrite) : child
  )
  const attributes = rewrite(element)
  const childrenChanged = children.some((child, i) => child !== element.children[i])

  if (!childrenChanged && attributes === element.attributes) {
    return element
  }
  return withChanges(element, { attributes, children })
}

/**
 * Copy an attribute map, replacing values through a callback.
 * Returns the original map when nothing changed.
 */
export function rewriteValues(
  attributes: ReadonlyMap<string, string>,
  rewrite: (name: string, value: string) => string
): ReadonlyMap<string, string> {
  let changed = false
  const next = new Map<string, string>()
  for (const [name, value] of attributes) {
    const rewritten = rewrite(name, value)
    if (rewritten !== value) changed = true
    next.set(name, rewritten)
  }
  return changed ? next : attributes
}

function collectUrlTargets(value: string, into: Set<string>): void {
  for (const match of value.matchAll(LOCAL_URL_REFERENCE)) {
    into.add(match[2])
  }
}

/**
 * Every id the document points at through href or url(#id), including
 * references inside style text
 */
export function collectReferencedIds(root: SvgElement, into = new Set<string>()): Set<string> {
  for (const [name, value] of root.attributes) {
    if (HREF_ATTRIBUTES.includes(name) && value.trim().startsWith('#')) {
      into.add(value.trim().slice(1))
    } else {
      collectUrlTargets(value, into)
    }
  }
  for (const child of root.children) {
    if (child.kind === 'element') {
      collectReferencedIds(child, into)
    } else {
      collectUrlTargets(child.value, into)
    }
  }
  return into
}
