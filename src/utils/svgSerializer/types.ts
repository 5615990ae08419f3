// Serializer types

import type { SvgElement } from '../../types/svg'

export interface SerializeOptions {
  /** One node per line with indentation (default: compact) */
  pretty?: boolean
}

/**
 * Read-only view of a scene, layers already in render order
 */
export interface SceneSnapshot {
  readonly width: number
  readonly height: number
  readonly defs: readonly SvgElement[]
  readonly layers: ReadonlyArray<{
    readonly name: string
    readonly elements: readonly SvgElement[]
  }>
}
