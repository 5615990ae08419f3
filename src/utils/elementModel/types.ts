// Element factory types

import type { AttributeInput } from '../../types/svg'

/** A point as consumed by polygon/polyline builders */
export interface Point {
  x: number
  y: number
}

/** Extra attributes appended after a shape's geometry */
export type ExtraAttributes = AttributeInput
