// Budget-driven optimization pipeline

import { DEBUG, PRECISION } from '../../constants'
import type { OptimizationOutcome, OptimizationStepName } from '../../types/svg'
import { InvalidOptionError } from '../errors'
import { parseDocument } from '../svgSerializer'
import { DEFAULT_ATTRIBUTE_DEFAULTS } from './attributeDefaults'
import { measureSizeKb } from './measure'
import { OPTIMIZATION_STEPS } from './steps'
import type { OptimizationStep, OptimizeOptions, PrecisionSchedule, StrategyContext } from './types'

function assertBudget(maxSizeKb: number): void {
  if (typeof maxSizeKb !== 'number' || !Number.isFinite(maxSizeKb) || maxSizeKb <= 0) {
    throw new InvalidOptionError(`Budget must be a positive number of KB, got ${maxSizeKb}`)
  }
}

function resolveSchedule(overrides: Partial<PrecisionSchedule> = {}): PrecisionSchedule {
  const schedule = {
    start: overrides.start ?? PRECISION.START,
    step: overrides.step ?? PRECISION.STEP,
    floor: overrides.floor ?? PRECISION.FLOOR,
  }
  const { start, step, floor } = schedule
  if (![start, step, floor].every(Number.isInteger) || floor < 0 || step < 1 || start < floor || start > 100) {
    throw new InvalidOptionError(
      `Invalid precision schedule: start=${start} step=${step} floor=${floor}`
    )
  }
  return Object.freeze(schedule)
}

/**
 * Build the context handed to each strategy. Exported so single steps can
 * be exercised on their own.
 */
export function createStrategyContext(maxSizeKb: number, options: OptimizeOptions = {}): StrategyContext {
  assertBudget(maxSizeKb)
  return {
    maxSizeKb,
    precision: resolveSchedule(options.precision),
    attributeDefaults: options.attributeDefaults ?? DEFAULT_ATTRIBUTE_DEFAULTS,
    trace: {},
  }
}

function outcome(
  document: string,
  sizeKb: number,
  maxSizeKb: number,
  appliedSteps: OptimizationStepName[],
  precision?: number
): OptimizationOutcome {
  return Object.freeze({
    document,
    sizeKb,
    metBudget: sizeKb <= maxSizeKb,
    appliedSteps: Object.freeze([...appliedSteps]),
    ...(precision !== undefined ? { precision } : {}),
  })
}

/**
 * Shrink a document towards a budget by running the reduction steps in
 * order, stopping as soon as the size fits.
 *
 * A budget miss is not an error: the smallest document reached is returned
 * with metBudget false. Throws MalformedDocumentError for unparseable input.
 */
export function optimizeDocument(
  document: string,
  maxSizeKb: number,
  options: OptimizeOptions = {},
  steps: readonly OptimizationStep[] = OPTIMIZATION_STEPS
): OptimizationOutcome {
  const context = createStrategyContext(maxSizeKb, options)
  parseDocument(document)

  let current = document
  let currentSize = measureSizeKb(document)
  if (currentSize <= maxSizeKb) {
    return outcome(current, currentSize, maxSizeKb, [])
  }

  const applied: OptimizationStepName[] = []
  for (const step of steps) {
    const next = step.apply(current, context)
    const nextSize = measureSizeKb(next)

    // A step that would grow the document is discarded
    if (next !== current && nextSize <= currentSize) {
      DEBUG && console.log(
        `[Optimize] ${step.name}: ${currentSize.toFixed(2)}KB -> ${nextSize.toFixed(2)}KB`
      )
      current = next
      currentSize = nextSize
      applied.push(step.name)
    }

    if (currentSize <= maxSizeKb) break
  }

  const precision = applied.includes('precision') ? context.trace.precision : undefined
  return outcome(current, currentSize, maxSizeKb, applied, precision)
}
