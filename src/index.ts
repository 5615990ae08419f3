// Public API

export type {
  AttributeValue,
  AttributeInput,
  SvgElement,
  SvgText,
  SvgNode,
  ChildInput,
  OptimizationOutcome,
  OptimizationStepName,
} from './types/svg'

export { SVG_NAMESPACE, PRECISION, BYTES_PER_KB } from './constants'

export {
  SvgBudgetError,
  DuplicateLayerError,
  UnknownLayerError,
  InvalidElementError,
  MalformedDocumentError,
  InvalidOptionError,
  ComplianceError,
} from './utils/errors'

export * from './utils/elementModel'
export * from './utils/scene'
export * from './utils/svgSerializer'
export * from './utils/svgOptimizer'
export * from './utils/compliance'
