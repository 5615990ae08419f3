// Scene graph types

import type { SvgElement } from '../../types/svg'
import type { CompliancePolicy } from '../compliance'

/**
 * A named, z-ordered run of elements. Append-only.
 */
export interface Layer {
  readonly name: string
  /** Render order, ascending */
  readonly zIndex: number
  /** Creation sequence number; breaks zIndex ties */
  readonly order: number
  readonly elements: readonly SvgElement[]
}

export interface SceneOptions {
  /** Size budget checked by validate() */
  maxSizeKb?: number
  /** Ceiling on the number of layer elements, descendants included */
  maxElements?: number
  /** Allowlist used by validate(); defaults to the bundled policy */
  policy?: CompliancePolicy
}
