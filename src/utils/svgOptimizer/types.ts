// Size optimizer types

import type { OptimizationStepName } from '../../types/svg'

/**
 * Decimal places tried by the lossy step, highest first
 */
export interface PrecisionSchedule {
  readonly start: number
  readonly step: number
  readonly floor: number
}

export interface PresentationDefault {
  readonly value: string
  /** Inherited properties can only be elided where no ancestor overrides them */
  readonly inherited: boolean
}

/**
 * Resolved table of values a renderer assumes when an attribute is absent
 */
export interface AttributeDefaults {
  readonly presentation: ReadonlyMap<string, PresentationDefault>
  readonly elements: ReadonlyMap<string, ReadonlyMap<string, string>>
}

export interface OptimizeOptions {
  precision?: Partial<PrecisionSchedule>
  attributeDefaults?: AttributeDefaults
}

/** Written by steps that have something to report beyond the document */
export interface StepTrace {
  precision?: number
}

export interface StrategyContext {
  readonly maxSizeKb: number
  readonly precision: PrecisionSchedule
  readonly attributeDefaults: AttributeDefaults
  readonly trace: StepTrace
}

/**
 * One entry of the reduction pipeline. Each maps a document to a document
 * that is never larger.
 */
export interface OptimizationStep {
  readonly name: OptimizationStepName
  readonly lossless: boolean
  readonly apply: (document: string, context: StrategyContext) => string
}

/**
 * Attributes whose value is a color; the only place shorthand folding applies
 */
export const COLOR_ATTRIBUTES = [
  'fill', 'stroke', 'stop-color', 'color', 'flood-color', 'lighting-color'
] as const

/**
 * Attributes holding numbers or number lists that precision reduction rounds
 */
export const NUMERIC_ATTRIBUTES = [
  'x', 'y', 'x1', 'y1', 'x2', 'y2', 'cx', 'cy', 'r', 'rx', 'ry', 'fx', 'fy', 'fr',
  'dx', 'dy', 'width', 'height', 'd', 'points', 'transform', 'gradientTransform',
  'patternTransform', 'viewBox', 'offset', 'opacity', 'fill-opacity', 'stroke-opacity',
  'stop-opacity', 'stroke-width', 'stroke-dasharray', 'stroke-dashoffset',
  'stroke-miterlimit', 'font-size'
] as const

/**
 * Containers whose content is rendered at the point of reference, so it
 * must not be assumed to inherit from its ancestors in the tree
 */
export const REFERENCED_CONTAINERS = [
  'defs', 'symbol', 'pattern', 'marker', 'clipPath', 'mask'
] as const
