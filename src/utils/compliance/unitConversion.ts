// Canvas length parsing

// Absolute units only; relative units have no fixed canvas size
export const UNIT_TO_PX: Record<string, number> = {
  '': 1,
  'px': 1,
  'pt': 96 / 72,        // 1pt = 1.333px
  'pc': 96 / 6,         // 1pc = 16px
  'in': 96,             // 1in = 96px
  'cm': 96 / 2.54,      // 1cm = 37.8px
  'mm': 96 / 25.4,      // 1mm = 3.78px
}

/**
 * Parse a CSS length value with unit
 * Returns { value, unit } or null if invalid
 */
export function parseLengthWithUnit(str: string | undefined): { value: number; unit: string } | null {
  if (!str) return null

  const trimmed = str.trim()
  if (!trimmed) return null

  // Match number (including scientific notation) followed by optional unit
  const match = trimmed.match(/^(-?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*([a-z%]*)$/i)
  if (!match) return null

  const value = parseFloat(match[1])
  if (isNaN(value)) return null

  return { value, unit: match[2].toLowerCase() }
}

/**
 * Convert a length to pixels; null for units without a fixed size
 */
export function lengthToPixels(value: number, unit: string): number | null {
  const factor = UNIT_TO_PX[unit]
  return factor === undefined ? null : value * factor
}
