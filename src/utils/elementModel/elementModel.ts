// Element construction, validation and structural identity

import type {
  AttributeInput,
  AttributeValue,
  ChildInput,
  SvgElement,
  SvgNode,
  SvgText,
} from '../../types/svg'
import { InvalidElementError } from '../errors'
import { AttributeMap } from './attributeMap'

// XML Name, with at most one namespace prefix
const NAME_PATTERN = /^[A-Za-z_][\w.-]*(?::[A-Za-z_][\w.-]*)?$/

// Elements built by createElement/withChanges; anything else is rebuilt on entry
const built = new WeakSet<object>()

function isEntryIterable(input: AttributeInput): input is Iterable<readonly [string, AttributeValue]> {
  return Symbol.iterator in input
}

function stringifyValue(key: string, value: AttributeValue): string {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidElementError(`Attribute "${key}" has non-finite value ${value}`)
    }
    return String(value)
  }
  if (typeof value !== 'string') {
    throw new InvalidElementError(`Attribute "${key}" must be a string or number`)
  }
  return value
}

export function isElement(node: SvgNode): node is SvgElement {
  return node.kind === 'element'
}

export function isText(node: SvgNode): node is SvgText {
  return node.kind === 'text'
}

/** Element children only, in order */
export function childElements(element: SvgElement): SvgElement[] {
  return element.children.filter(isElement)
}

/** Concatenated character data of a subtree */
export function textContent(node: SvgNode): string {
  return isText(node) ? node.value : node.children.map(textContent).join('')
}

/**
 * Validate attribute input and freeze it into an ordered map
 */
export function normalizeAttributes(input: AttributeInput = {}): ReadonlyMap<string, string> {
  if (typeof input !== 'object' || input === null) {
    throw new InvalidElementError('Attributes must be a record or a list of entries')
  }
  const entries: Iterable<readonly [string, AttributeValue]> = isEntryIterable(input)
    ? input
    : Object.entries(input)

  const attributes = new Map<string, string>()
  for (const [key, value] of entries) {
    if (typeof key !== 'string' || key.length === 0) {
      throw new InvalidElementError('Attribute keys must be non-empty strings')
    }
    if (!NAME_PATTERN.test(key)) {
      throw new InvalidElementError(`Attribute key "${key}" is not a valid markup name`)
    }
    if (attributes.has(key)) {
      throw new InvalidElementError(`Duplicate attribute "${key}"`)
    }
    attributes.set(key, stringifyValue(key, value))
  }
  return new AttributeMap(attributes)
}

export function createText(value: string): SvgText {
  if (typeof value !== 'string') {
    throw new InvalidElementError('Text content must be a string')
  }
  const text: SvgText = { kind: 'text', value }
  return Object.freeze(text)
}

/**
 * Return the element itself when it came from this module, otherwise
 * rebuild it (and its subtree) through the validating constructor.
 */
export function ensureElement(element: SvgElement): SvgElement {
  if (built.has(element)) return element
  if (typeof element !== 'object' || element === null) {
    throw new InvalidElementError('Expected an element')
  }
  return createElement(element.tag, element.attributes, element.children)
}

/**
 * Validate children, turning strings into text nodes. Adjacent text is
 * merged and empty text dropped, so equal content has one shape.
 */
function normalizeChildren(children: readonly ChildInput[]): SvgNode[] {
  const list: readonly ChildInput[] = children
  if (!Array.isArray(list)) {
    throw new InvalidElementError('Children must be an array')
  }

  const nodes: SvgNode[] = []
  let pending = ''
  const flush = () => {
    if (pending.length > 0) nodes.push(createText(pending))
    pending = ''
  }

  for (const child of children) {
    if (typeof child === 'string') {
      pending += child
    } else if (child.kind === 'text') {
      pending += createText(child.value).value
    } else {
      flush()
      nodes.push(ensureElement(child))
    }
  }
  flush()
  return nodes
}

function freezeElement(tag: string, attributes: ReadonlyMap<string, string>, children: SvgNode[]): SvgElement {
  const element: SvgElement = {
    kind: 'element',
    tag,
    attributes,
    children: Object.freeze(children),
  }
  built.add(Object.freeze(element))
  return element
}

/**
 * Build an immutable element. Throws InvalidElementError on a tag or
 * attribute key that is not an XML name, or a non-finite numeric value.
 */
export function createElement(
  tag: string,
  attributes: AttributeInput = {},
  children: readonly ChildInput[] = []
): SvgElement {
  if (typeof tag !== 'string' || tag.length === 0) {
    throw new InvalidElementError('Element tag must be a non-empty string')
  }
  if (!NAME_PATTERN.test(tag)) {
    throw new InvalidElementError(`Element tag "${tag}" is not a valid markup name`)
  }
  return freezeElement(tag, normalizeAttributes(attributes), normalizeChildren(children))
}

/**
 * Return a copy of an element with some fields replaced.
 * Used by the optimizer and sanitizer, which never edit a tree in place.
 */
export function withChanges(
  element: SvgElement,
  changes: {
    attributes?: ReadonlyMap<string, string>
    children?: readonly SvgNode[]
  }
): SvgElement {
  const attributes = changes.attributes ?? element.attributes
  return freezeElement(
    element.tag,
    attributes instanceof AttributeMap ? attributes : normalizeAttributes(attributes),
    normalizeChildren(changes.children ?? element.children)
  )
}

function nodeKey(node: SvgNode): string {
  return isText(node) ? JSON.stringify(['#text', node.value]) : elementKey(node)
}

/**
 * Canonical identity string. Attribute order is ignored because attributes
 * form a mapping; child order is kept.
 */
export function elementKey(element: SvgElement): string {
  const attributes = [...element.attributes.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  return JSON.stringify([element.tag, attributes, element.children.map(nodeKey)])
}

/**
 * Structural equality: same tag, attribute mapping and children
 */
export function elementsEqual(a: SvgElement, b: SvgElement): boolean {
  return a === b || elementKey(a) === elementKey(b)
}

/**
 * Count an element and all its descendant elements
 */
export function countElements(element: SvgElement): number {
  return 1 + childElements(element).reduce((sum, child) => sum + countElements(child), 0)
}
