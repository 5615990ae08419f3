// Compliance types

export interface CanvasLimits {
  readonly minWidth: number
  readonly maxWidth: number
  readonly minHeight: number
  readonly maxHeight: number
}

/**
 * Resolved allowlist. Anything not named here is removed or rejected.
 */
export interface CompliancePolicy {
  readonly namespace: string
  readonly canvas: CanvasLimits
  /** Attributes permitted on every allowed tag */
  readonly globalAttributes: ReadonlySet<string>
  /** Allowed tags and the attributes each adds to the global set */
  readonly tags: ReadonlyMap<string, ReadonlySet<string>>
}

export interface CanvasSize {
  width: number
  height: number
}
