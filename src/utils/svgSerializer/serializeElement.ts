// Element tree -> markup

import type { SvgElement, SvgNode } from '../../types/svg'
import { SERIALIZER, TEXT_CONTENT_TAGS } from '../../constants'
import { escapeAttribute, escapeText } from './escape'
import type { SerializeOptions } from './types'

function serializeAttributes(attributes: ReadonlyMap<string, string>): string {
  let result = ''
  for (const [key, value] of attributes) {
    result += ` ${key}="${escapeAttribute(value)}"`
  }
  return result
}

function renderCompact(node: SvgNode): string {
  if (node.kind === 'text') return escapeText(node.value)

  const open = `<${node.tag}${serializeAttributes(node.attributes)}`
  if (node.children.length === 0) return `${open}/>`
  return `${open}>${node.children.map(renderCompact).join('')}</${node.tag}>`
}

// Indenting would add character data where text is significant
function keepsInline(element: SvgElement): boolean {
  return (
    element.children.length === 0 ||
    TEXT_CONTENT_TAGS.includes(element.tag) ||
    element.children.some(child => child.kind === 'text')
  )
}

function renderPretty(element: SvgElement, depth: number, out: string[]): void {
  const indent = SERIALIZER.INDENT.repeat(depth)
  if (keepsInline(element)) {
    out.push(indent + renderCompact(element))
    return
  }

  out.push(`${indent}<${element.tag}${serializeAttributes(element.attributes)}>`)
  for (const child of element.children) {
    if (child.kind === 'element') renderPretty(child, depth + 1, out)
  }
  out.push(`${indent}</${element.tag}>`)
}

/**
 * Render an element and its descendants depth-first.
 * Attributes are emitted in stored order, so equal trees give equal text.
 * Pretty output puts one element per line, except where an element holds
 * character data, which stays on one line exactly as in compact output.
 */
export function serializeElement(element: SvgElement, options: SerializeOptions = {}): string {
  if (!options.pretty) return renderCompact(element)

  const out: string[] = []
  renderPretty(element, 0, out)
  return out.join(SERIALIZER.NEWLINE)
}
