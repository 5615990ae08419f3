// Allowlist enforcement

import { DEBUG } from '../../constants'
import type { SvgElement, SvgNode } from '../../types/svg'
import { withChanges } from '../elementModel'
import { ComplianceError } from '../errors'
import { parseDocument, serializeElement } from '../svgSerializer'
import { DEFAULT_COMPLIANCE_POLICY } from './policy'
import type { CompliancePolicy } from './types'

const HREF_ATTRIBUTES = ['href', 'xlink:href']
const DANGEROUS_SCHEME = /(?:javascript|vbscript|data)\s*:/i
// Strictly local url(#id); whatever url( is left after removing these is foreign
const LOCAL_URL = /url\(\s*(['"]?)#[^)'"\s]+\1\s*\)/gi
const ANY_URL = /url\s*\(/i

export function isTagAllowed(tag: string, policy: CompliancePolicy): boolean {
  return policy.tags.has(tag)
}

export function isAttributeAllowed(tag: string, name: string, policy: CompliancePolicy): boolean {
  if (name.toLowerCase().startsWith('on')) return false
  return policy.globalAttributes.has(name) || (policy.tags.get(tag)?.has(name) ?? false)
}

/**
 * Values may only point inside the document: href must be a fragment and
 * every url() must be a well-formed fragment reference.
 */
export function isValueSafe(name: string, value: string): boolean {
  if (DANGEROUS_SCHEME.test(value)) return false

  if (HREF_ATTRIBUTES.includes(name)) {
    return value.trim().startsWith('#')
  }

  // A CSS escape can spell url( without the letters
  if (value.includes('\\') && value.includes('(')) return false
  return !ANY_URL.test(value.replace(LOCAL_URL, ''))
}

function sanitizeElement(element: SvgElement, policy: CompliancePolicy): SvgElement | null {
  if (!isTagAllowed(element.tag, policy)) {
    DEBUG && console.warn(`[Compliance] Dropped <${element.tag}> and its descendants`)
    return null
  }

  const attributes = new Map<string, string>()
  for (const [name, value] of element.attributes) {
    if (isAttributeAllowed(element.tag, name, policy) && isValueSafe(name, value)) {
      attributes.set(name, value)
    } else {
      DEBUG && console.warn(`[Compliance] Dropped ${name} on <${element.tag}>`)
    }
  }

  const children: SvgNode[] = []
  for (const child of element.children) {
    if (child.kind === 'text') {
      children.push(child)
      continue
    }
    const sanitized = sanitizeElement(child, policy)
    if (sanitized) children.push(sanitized)
  }

  return withChanges(element, { attributes, children })
}

/**
 * Remove every disallowed element (with its subtree) and attribute.
 * The root must be an allowed svg element in the policy namespace; a
 * missing namespace declaration is added.
 */
export function sanitizeTree(root: SvgElement, policy: CompliancePolicy = DEFAULT_COMPLIANCE_POLICY): SvgElement {
  if (root.tag !== 'svg' || !isTagAllowed(root.tag, policy)) {
    throw new ComplianceError('root', `expected an <svg> root element, found <${root.tag}>`)
  }

  const declared = root.attributes.get('xmlns')
  if (declared !== undefined && declared !== policy.namespace) {
    throw new ComplianceError('namespace', `root declares "${declared}" instead of "${policy.namespace}"`)
  }

  const sanitized = sanitizeElement(root, policy)
  if (!sanitized) {
    throw new ComplianceError('root', 'root element was removed by the allowlist')
  }

  if (sanitized.attributes.has('xmlns')) return sanitized

  const attributes = new Map<string, string>()
  attributes.set('xmlns', policy.namespace)
  for (const [name, value] of sanitized.attributes) {
    attributes.set(name, value)
  }
  return withChanges(sanitized, { attributes })
}

/**
 * Parse, strip disallowed content, and re-emit compactly
 */
export function sanitizeDocument(document: string, policy: CompliancePolicy = DEFAULT_COMPLIANCE_POLICY): string {
  return serializeElement(sanitizeTree(parseDocument(document), policy))
}

/**
 * First allowlist violation in a tree, or null when the tree is clean
 */
export function findViolation(root: SvgElement, policy: CompliancePolicy): string | null {
  if (!isTagAllowed(root.tag, policy)) return `tag <${root.tag}>`

  for (const [name, value] of root.attributes) {
    if (!isAttributeAllowed(root.tag, name, policy)) return `attribute ${name} on <${root.tag}>`
    if (!isValueSafe(name, value)) return `value of ${name} on <${root.tag}>`
  }

  for (const child of root.children) {
    if (child.kind === 'text') continue
    const violation = findViolation(child, policy)
    if (violation) return violation
  }
  return null
}
