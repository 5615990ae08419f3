/**
 * Library-wide constants
 * Centralizes magic numbers and configuration values for easier maintenance
 */

// ============================================================================
// Markup
// ============================================================================

/** Namespace declared on every emitted root */
export const SVG_NAMESPACE = 'http://www.w3.org/2000/svg'

/**
 * Elements whose character data is rendered. Whitespace inside them is
 * significant, so they are never re-indented.
 */
export const TEXT_CONTENT_TAGS: readonly string[] = ['text', 'tspan', 'textPath', 'title', 'desc']

export const SERIALIZER = {
  /** Indentation used for pretty output */
  INDENT: '  ',
  /** Newline used for pretty output */
  NEWLINE: '\n',
} as const

// ============================================================================
// Size Budget
// ============================================================================

/** 1 KB = 1024 bytes of UTF-8 */
export const BYTES_PER_KB = 1024

export const PRECISION = {
  /** Decimal places tried first by the lossy step */
  START: 3,
  /** Decimal places removed per iteration */
  STEP: 1,
  /** Lowest precision ever tried */
  FLOOR: 0,
} as const

// ============================================================================
// Diagnostics
// ============================================================================

/** Set SVG_BUDGET_DEBUG=1 to trace optimizer and sanitizer decisions */
export const DEBUG = typeof process !== 'undefined' && process.env.SVG_BUDGET_DEBUG === '1'
