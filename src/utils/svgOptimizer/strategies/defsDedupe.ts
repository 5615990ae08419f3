// Step 4: structural dedup and pruning of resource definitions (lossless)

import type { SvgElement, SvgNode } from '../../../types/svg'
import { elementKey, withChanges } from '../../elementModel'
import {
  collectReferencedIds,
  HREF_ATTRIBUTES,
  LOCAL_URL_REFERENCE,
  mapAttributes,
  rewriteValues,
  transformDocument,
} from '../treeUtils'

interface DedupeState {
  // identity key (ignoring the top-level id) -> surviving definition
  readonly survivors: Map<string, SvgElement>
  // removed id -> surviving id
  readonly renames: Map<string, string>
  merged: number
}

function identityKey(definition: SvgElement): string {
  const attributes = new Map(definition.attributes)
  attributes.delete('id')
  const anchor = definition.attributes.has('id') ? 'ref' : 'anon'
  return anchor + elementKey(withChanges(definition, { attributes }))
}

function dedupeContainer(defs: SvgElement, state: DedupeState): SvgElement {
  const kept: SvgNode[] = []

  for (const definition of defs.children) {
    if (definition.kind === 'text') {
      kept.push(definition)
      continue
    }

    const key = identityKey(definition)
    const survivor = state.survivors.get(key)
    if (!survivor) {
      state.survivors.set(key, definition)
      kept.push(definition)
      continue
    }

    const removedId = definition.attributes.get('id')
    const survivorId = survivor.attributes.get('id')
    if (removedId !== undefined && survivorId !== undefined && removedId !== survivorId) {
      state.renames.set(removedId, survivorId)
    }
    state.merged++
  }

  return kept.length === defs.children.length ? defs : withChanges(defs, { children: kept })
}

/**
 * Apply a rewrite to every defs container, leaving the rest of the tree as is
 */
function mapDefs(element: SvgElement, rewrite: (defs: SvgElement) => SvgElement): SvgElement {
  if (element.tag === 'defs') {
    return rewrite(element)
  }
  const children = element.children.map(child => (child.kind === 'element' ? mapDefs(child, rewrite) : child))
  const changed = children.some((child, i) => child !== element.children[i])
  return changed ? withChanges(element, { children }) : element
}

/**
 * Point references at surviving definitions
 */
export function rewriteReferences(root: SvgElement, renames: ReadonlyMap<string, string>): SvgElement {
  if (renames.size === 0) return root

  return mapAttributes(root, element =>
    rewriteValues(element.attributes, (name, value) => {
      if (HREF_ATTRIBUTES.includes(name) && value.startsWith('#')) {
        const target = renames.get(value.slice(1))
        return target !== undefined ? `#${target}` : value
      }
      return value.replace(LOCAL_URL_REFERENCE, (whole: string, quote: string, id: string) => {
        const target = renames.get(id)
        return target !== undefined ? `url(${quote}#${target}${quote})` : whole
      })
    })
  )
}

function subtreeIds(element: SvgElement, into: string[] = []): string[] {
  const id = element.attributes.get('id')
  if (id !== undefined) into.push(id)
  for (const child of element.children) {
    if (child.kind === 'element') subtreeIds(child, into)
  }
  return into
}

/**
 * Drop definitions nothing points at. A definition without any id is
 * kept, since it cannot be told apart from content placed there on purpose.
 */
function pruneOnce(root: SvgElement): { root: SvgElement; removed: number } {
  const referenced = collectReferencedIds(root)
  let removed = 0

  const pruned = mapDefs(root, defs => {
    const kept = defs.children.filter(definition => {
      if (definition.kind === 'text') return true
      const ids = subtreeIds(definition)
      const used = ids.length === 0 || ids.some(id => referenced.has(id))
      if (!used) removed++
      return used
    })
    return kept.length === defs.children.length ? defs : withChanges(defs, { children: kept })
  })

  return { root: pruned, removed }
}

export function pruneUnusedDefs(root: SvgElement): SvgElement {
  let current = root
  for (;;) {
    const { root: next, removed } = pruneOnce(current)
    if (removed === 0) return current
    current = next
  }
}

/**
 * Merge structurally identical children of defs containers, rewrite
 * references and drop definitions left unreferenced. Repeats until stable,
 * because a rewrite can make two definitions that referenced different
 * duplicates identical, and a removal can orphan what it referenced.
 */
export function dedupeDefs(root: SvgElement): SvgElement {
  let current = root
  for (;;) {
    const state: DedupeState = { survivors: new Map(), renames: new Map(), merged: 0 }
    const collapsed = mapDefs(current, defs => dedupeContainer(defs, state))
    const rewritten = state.merged > 0 ? rewriteReferences(collapsed, state.renames) : current
    const { root: pruned, removed } = pruneOnce(rewritten)

    if (state.merged === 0 && removed === 0) return current
    current = pruned
  }
}

export function dedupeDefinitions(document: string): string {
  return transformDocument(document, dedupeDefs)
}
