// The fixed reduction order

import type { OptimizationStep } from './types'
import { normalizeWhitespace } from './strategies/whitespace'
import { elideDefaultAttributes } from './strategies/defaultElision'
import { foldColorShorthand } from './strategies/colorFolding'
import { dedupeDefinitions } from './strategies/defsDedupe'
import { reducePrecision } from './strategies/precisionReduction'

/**
 * Least destructive first. The optimizer stops after the first step that
 * brings the document within budget, so later entries only run when the
 * earlier ones were not enough.
 */
const steps: OptimizationStep[] = [
  {
    name: 'whitespace',
    lossless: true,
    apply: (document: string) => normalizeWhitespace(document),
  },
  {
    name: 'defaults',
    lossless: true,
    apply: (document, context) => elideDefaultAttributes(document, context.attributeDefaults),
  },
  {
    name: 'colors',
    lossless: true,
    apply: (document: string) => foldColorShorthand(document),
  },
  {
    name: 'dedupe',
    lossless: true,
    apply: (document: string) => dedupeDefinitions(document),
  },
  {
    name: 'precision',
    lossless: false,
    apply: reducePrecision,
  },
]

export const OPTIMIZATION_STEPS: readonly OptimizationStep[] = Object.freeze(steps)
