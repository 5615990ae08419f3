// Step 5: numeric precision reduction (lossy, iterative)

import { DEBUG } from '../../../constants'
import type { SvgElement } from '../../../types/svg'
import { parseDocument, serializeElement } from '../../svgSerializer'
import { measureSizeKb } from '../measure'
import { roundNumbersInValue } from '../numbers'
import { mapAttributes, rewriteValues } from '../treeUtils'
import { NUMERIC_ATTRIBUTES } from '../types'
import type { PrecisionSchedule, StrategyContext } from '../types'
import { elideDefaults } from './defaultElision'
import { dedupeDefs } from './defsDedupe'

function isNumericAttribute(name: string): boolean {
  return (NUMERIC_ATTRIBUTES as readonly string[]).includes(name)
}

/**
 * Round every numeric attribute value to the given number of decimals
 */
export function roundNumbers(root: SvgElement, precision: number): SvgElement {
  return mapAttributes(root, element =>
    rewriteValues(element.attributes, (name, value) =>
      isNumericAttribute(name) ? roundNumbersInValue(value, precision) : value
    )
  )
}

/**
 * Precision levels in the order they are tried
 */
export function precisionLevels(schedule: PrecisionSchedule): number[] {
  const levels: number[] = []
  for (let level = schedule.start; level > schedule.floor; level -= schedule.step) {
    levels.push(level)
  }
  levels.push(schedule.floor)
  return levels
}

/**
 * Try decreasing precisions, each rounded from the step's input so errors
 * never compound. Rounding can turn a value into its default or make two
 * definitions identical, so the lossless cleanups run again per level.
 * Stops at the first level that fits the budget; otherwise returns the
 * smallest candidate.
 */
export function reducePrecision(document: string, context: StrategyContext): string {
  const base = parseDocument(document)
  let best = document
  let bestSize = measureSizeKb(document)

  for (const level of precisionLevels(context.precision)) {
    const rounded = roundNumbers(base, level)
    const candidate = serializeElement(dedupeDefs(elideDefaults(rounded, context.attributeDefaults)))
    const size = measureSizeKb(candidate)

    DEBUG && console.log(`[Optimize] precision ${level}: ${size.toFixed(2)}KB`)

    if (size <= bestSize && candidate !== best) {
      best = candidate
      bestSize = size
      context.trace.precision = level
    }
    if (bestSize <= context.maxSizeKb) break
  }

  return best
}
