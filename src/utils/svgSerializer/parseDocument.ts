// Markup -> element tree

import { DOMParser } from '@xmldom/xmldom'
import { TEXT_CONTENT_TAGS } from '../../constants'
import type { ChildInput, SvgElement } from '../../types/svg'
import { createElement } from '../elementModel'
import { MalformedDocumentError } from '../errors'

const ELEMENT_NODE = 1
const TEXT_NODE = 3
const CDATA_SECTION_NODE = 4

function isElementNode(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE
}

function isTextNode(node: Node): boolean {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE
}

function isWhitespace(text: string): boolean {
  return text.trim().length === 0
}

/**
 * Character data keeps its place among child elements. A whitespace-only
 * run is formatting, except inside text content, where it separates words
 * and is kept as a single space.
 */
function convertElement(element: Element): SvgElement {
  const attributes: Array<[string, string]> = []
  for (let i = 0; i < element.attributes.length; i++) {
    const attr = element.attributes.item(i)
    if (attr) {
      attributes.push([attr.name, attr.value])
    }
  }

  const significantSpace = TEXT_CONTENT_TAGS.includes(element.tagName)
  const children: ChildInput[] = []
  let pending = ''
  const flush = () => {
    if (pending.length === 0) return
    if (!isWhitespace(pending)) {
      children.push(pending)
    } else if (significantSpace) {
      children.push(' ')
    }
    pending = ''
  }

  for (let i = 0; i < element.childNodes.length; i++) {
    const node = element.childNodes.item(i)
    if (isElementNode(node)) {
      flush()
      children.push(convertElement(node))
    } else if (isTextNode(node)) {
      pending += node.nodeValue ?? ''
    }
    // Comments and processing instructions carry no rendering
  }
  flush()

  try {
    return createElement(element.tagName, attributes, children)
  } catch (error) {
    throw new MalformedDocumentError(`Invalid element <${element.tagName}>`, { cause: error })
  }
}

/**
 * Parse a markup document into an immutable element tree.
 * Any parser warning or error is treated as malformed input.
 */
export function parseDocument(source: string): SvgElement {
  if (typeof source !== 'string' || source.trim().length === 0) {
    throw new MalformedDocumentError('Document is empty')
  }

  const problems: string[] = []
  const collect = (message: string) => {
    problems.push(String(message))
  }

  let doc: Document
  try {
    doc = new DOMParser({
      errorHandler: { warning: collect, error: collect, fatalError: collect },
    }).parseFromString(source, 'image/svg+xml')
  } catch (error) {
    throw new MalformedDocumentError('Document is not well-formed markup', { cause: error })
  }

  if (problems.length > 0) {
    throw new MalformedDocumentError(`Document is not well-formed markup: ${problems[0]}`)
  }

  const root = doc.documentElement
  if (!root) {
    throw new MalformedDocumentError('Document has no root element')
  }

  return convertElement(root)
}
