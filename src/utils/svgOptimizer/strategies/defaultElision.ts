// Step 2: default-attribute elision (lossless)

import type { SvgElement } from '../../../types/svg'
import { withChanges } from '../../elementModel'
import { sameValue } from '../numbers'
import { collectReferencedIds, transformDocument } from '../treeUtils'
import { REFERENCED_CONTAINERS } from '../types'
import type { AttributeDefaults } from '../types'

// Explicit values set by ancestors for inherited properties
type InheritedValues = ReadonlyMap<string, string>

function isReferencedContainer(tag: string): boolean {
  return (REFERENCED_CONTAINERS as readonly string[]).includes(tag)
}

function containsStyling(root: SvgElement): boolean {
  if (root.tag === 'style' || root.attributes.has('style') || root.attributes.has('class')) {
    return true
  }
  return root.children.some(child => child.kind === 'element' && containsStyling(child))
}

interface ElisionScope {
  readonly defaults: AttributeDefaults
  // ids instantiated elsewhere (use, url()), which inherit from the referencing site
  readonly referenced: ReadonlySet<string>
}

function elide(
  element: SvgElement,
  scope: ElisionScope,
  inherited: InheritedValues,
  ancestryKnown: boolean
): SvgElement {
  const { defaults } = scope
  const id = element.attributes.get('id')
  const inheritanceKnown = ancestryKnown && !(id !== undefined && scope.referenced.has(id))
  const elementDefaults = defaults.elements.get(element.tag)
  const attributes = new Map<string, string>()
  const passDown = new Map(inherited)
  let changed = false

  for (const [name, value] of element.attributes) {
    const presentation = defaults.presentation.get(name)
    const elementDefault = elementDefaults?.get(name)
    let elidable = false

    if (elementDefault !== undefined && sameValue(value, elementDefault)) {
      elidable = true
    } else if (presentation && sameValue(value, presentation.value)) {
      if (!presentation.inherited) {
        elidable = true
      } else if (inheritanceKnown) {
        const fromAncestor = inherited.get(name)
        elidable = fromAncestor === undefined || sameValue(fromAncestor, presentation.value)
      }
    }

    if (elidable) {
      changed = true
      continue
    }
    attributes.set(name, value)
    if (presentation?.inherited) {
      passDown.set(name, value)
    }
  }

  // Content of referenced containers inherits from the referencing site
  const childInheritanceKnown = inheritanceKnown && !isReferencedContainer(element.tag)
  const children = element.children.map(child =>
    child.kind === 'element' ? elide(child, scope, passDown, childInheritanceKnown) : child
  )
  const childrenChanged = children.some((child, i) => child !== element.children[i])

  if (!changed && !childrenChanged) return element
  return withChanges(element, {
    attributes: changed ? attributes : element.attributes,
    children,
  })
}

/**
 * Drop attributes whose value equals what the renderer assumes anyway.
 * Inherited presentation attributes are only dropped where the effective
 * ancestor value is the default too, and never in content that is
 * referenced from elsewhere (its ancestors are the referencing site's).
 * When the document carries CSS (style attributes, classes or a style
 * element) inheritance cannot be traced and only non-inherited defaults
 * are dropped.
 */
export function elideDefaults(root: SvgElement, defaults: AttributeDefaults): SvgElement {
  const scope: ElisionScope = { defaults, referenced: collectReferencedIds(root) }
  return elide(root, scope, new Map(), !containsStyling(root))
}

export function elideDefaultAttributes(document: string, defaults: AttributeDefaults): string {
  return transformDocument(document, root => elideDefaults(root, defaults))
}
