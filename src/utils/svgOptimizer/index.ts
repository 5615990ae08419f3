// Size optimizer exports

export type {
  PrecisionSchedule,
  PresentationDefault,
  AttributeDefaults,
  OptimizeOptions,
  StepTrace,
  StrategyContext,
  OptimizationStep,
} from './types'
export { COLOR_ATTRIBUTES, NUMERIC_ATTRIBUTES, REFERENCED_CONTAINERS } from './types'

export type { AttributeDefaultsInput } from './attributeDefaults'
export {
  AttributeDefaultsSchema,
  createAttributeDefaults,
  DEFAULT_ATTRIBUTE_DEFAULTS,
} from './attributeDefaults'

export { measureSizeKb } from './measure'
export { collectReferencedIds } from './treeUtils'
export { toNumber, sameValue, formatNumber, roundNumbersInValue } from './numbers'

// Individual strategies, tree and document level
export { normalizeWhitespace } from './strategies/whitespace'
export { elideDefaults, elideDefaultAttributes } from './strategies/defaultElision'
export { foldHexColor, foldColors, foldColorShorthand } from './strategies/colorFolding'
export { dedupeDefs, dedupeDefinitions, pruneUnusedDefs, rewriteReferences } from './strategies/defsDedupe'
export { roundNumbers, precisionLevels, reducePrecision } from './strategies/precisionReduction'

export { OPTIMIZATION_STEPS } from './steps'
export { optimizeDocument, createStrategyContext } from './optimizeDocument'
