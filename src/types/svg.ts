/**
 * Attribute values accepted when building an element.
 * Numbers are stringified at construction time.
 */
export type AttributeValue = string | number

/**
 * Attributes given either as a plain record or as ordered entries
 */
export type AttributeInput =
  | Readonly<Record<string, AttributeValue>>
  | Iterable<readonly [string, AttributeValue]>

/**
 * Character data between (or instead of) child elements
 */
export interface SvgText {
  readonly kind: 'text'
  readonly value: string
}

/**
 * One element of a vector document. Frozen once constructed; text and
 * child elements keep their document order.
 */
export interface SvgElement {
  readonly kind: 'element'
  readonly tag: string
  readonly attributes: ReadonlyMap<string, string>
  readonly children: readonly SvgNode[]
}

export type SvgNode = SvgElement | SvgText

/** Children as accepted by element builders; strings become text nodes */
export type ChildInput = SvgNode | string

/**
 * Result of one optimizer run
 */
export interface OptimizationOutcome {
  readonly document: string
  /** UTF-8 byte length / 1024 */
  readonly sizeKb: number
  readonly metBudget: boolean
  /** Strategies that changed the document, in the order they ran */
  readonly appliedSteps: readonly OptimizationStepName[]
  /** Decimal places the lossy step settled on, when it fired */
  readonly precision?: number
}

export type OptimizationStepName =
  | 'whitespace'
  | 'defaults'
  | 'colors'
  | 'dedupe'
  | 'precision'
