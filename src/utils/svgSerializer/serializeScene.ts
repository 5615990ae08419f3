// Scene -> document

import type { SvgElement } from '../../types/svg'
import { SVG_NAMESPACE } from '../../constants'
import { createElement } from '../elementModel'
import { serializeElement } from './serializeElement'
import type { SceneSnapshot } from './types'

/**
 * Assemble the root node: namespace and canvas first, then the defs
 * container, then one group per layer in the order given.
 */
export function buildDocumentTree(scene: SceneSnapshot): SvgElement {
  const children: SvgElement[] = []

  if (scene.defs.length > 0) {
    children.push(createElement('defs', {}, scene.defs))
  }

  for (const layer of scene.layers) {
    children.push(createElement('g', { id: layer.name }, layer.elements))
  }

  return createElement(
    'svg',
    [
      ['xmlns', SVG_NAMESPACE],
      ['width', scene.width],
      ['height', scene.height],
      ['viewBox', `0 0 ${scene.width} ${scene.height}`],
    ],
    children
  )
}

/**
 * Pure: the same snapshot always yields byte-identical output
 */
export function serializeScene(scene: SceneSnapshot): string {
  return serializeElement(buildDocumentTree(scene), { pretty: true })
}
