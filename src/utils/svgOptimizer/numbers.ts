// Numeric value helpers

const NUMBER_PATTERN = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/g
const WHOLE_NUMBER = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/

/**
 * Parse a plain number (no unit); null for anything else
 */
export function toNumber(value: string): number | null {
  const trimmed = value.trim()
  if (!WHOLE_NUMBER.test(trimmed)) return null
  const n = Number(trimmed)
  return Number.isFinite(n) ? n : null
}

/**
 * Compare attribute values: numerically when both are numbers, otherwise
 * as case-insensitive keywords
 */
export function sameValue(a: string, b: string): boolean {
  const na = toNumber(a)
  const nb = toNumber(b)
  if (na !== null && nb !== null) return na === nb
  return a.trim().toLowerCase() === b.trim().toLowerCase()
}

/**
 * Round one number token. The original token is kept whenever the rounded
 * text would not be shorter, so rounding never grows a value.
 */
export function formatNumber(token: string, precision: number): string {
  const n = Number(token)
  if (!Number.isFinite(n)) return token

  const rounded = Number(n.toFixed(precision))
  const text = Object.is(rounded, -0) ? '0' : String(rounded)
  return text.length < token.length ? text : token
}

/**
 * Two adjacent numbers with nothing between them parse apart only when the
 * second starts with a sign, or with a dot after a number that already has one
 */
function needsSeparator(previous: string, next: string): boolean {
  if (next.startsWith('-') || next.startsWith('+')) return false
  if (next.startsWith('.')) return !previous.includes('.') && !/[eE]/.test(previous)
  return true
}

/**
 * Round every number inside an attribute value (path data, point lists,
 * transforms, plain lengths)
 */
export function roundNumbersInValue(value: string, precision: number): string {
  let out = ''
  let last = 0
  let previousNumber: string | null = null

  for (const match of value.matchAll(NUMBER_PATTERN)) {
    const index = match.index ?? 0
    const gap = value.slice(last, index)
    if (gap.length > 0) {
      out += gap
      previousNumber = null
    }

    let replacement = formatNumber(match[0], precision)
    if (previousNumber !== null && needsSeparator(previousNumber, replacement)) {
      replacement = ' ' + replacement
    }

    out += replacement
    previousNumber = replacement.trim()
    last = index + match[0].length
  }

  return out + value.slice(last)
}
