// Error hierarchy shared by every module

/**
 * Base class for all errors raised by this library
 */
export class SvgBudgetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * A layer with the same name already exists in the scene
 */
export class DuplicateLayerError extends SvgBudgetError {
  readonly layerName: string

  constructor(layerName: string) {
    super(`Layer "${layerName}" already exists`)
    this.layerName = layerName
  }
}

/**
 * A layer name was referenced that the scene does not contain
 */
export class UnknownLayerError extends SvgBudgetError {
  readonly layerName: string

  constructor(layerName: string) {
    super(`Layer "${layerName}" does not exist`)
    this.layerName = layerName
  }
}

/** Malformed tag, attribute key or attribute value at construction */
export class InvalidElementError extends SvgBudgetError {}

/** Markup handed to the optimizer or sanitizer could not be parsed */
export class MalformedDocumentError extends SvgBudgetError {}

/** Bad numeric option (budget, canvas size, precision schedule) */
export class InvalidOptionError extends SvgBudgetError {}

/**
 * The document violates a legality constraint that cannot be repaired
 * without changing its meaning. Always fatal.
 */
export class ComplianceError extends SvgBudgetError {
  readonly constraint: string

  constructor(constraint: string, message: string) {
    super(`${constraint}: ${message}`)
    this.constraint = constraint
  }
}
