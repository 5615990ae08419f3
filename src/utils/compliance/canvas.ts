// Canvas legality

import type { SvgElement } from '../../types/svg'
import { ComplianceError } from '../errors'
import type { CanvasSize, CompliancePolicy } from './types'
import { lengthToPixels, parseLengthWithUnit } from './unitConversion'

function readDimension(root: SvgElement, name: 'width' | 'height'): number {
  const constraint = `canvas.${name}`
  const raw = root.attributes.get(name)
  if (raw === undefined) {
    throw new ComplianceError(constraint, 'root element has no fixed size')
  }

  const parsed = parseLengthWithUnit(raw)
  const pixels = parsed ? lengthToPixels(parsed.value, parsed.unit) : null
  if (pixels === null) {
    throw new ComplianceError(constraint, `"${raw}" is not an absolute length`)
  }
  return pixels
}

/**
 * Canvas dimensions must be absolute and inside the policy range. They
 * cannot be changed without changing what the document depicts, so a
 * violation is fatal.
 */
export function checkCanvas(root: SvgElement, policy: CompliancePolicy): CanvasSize {
  const width = readDimension(root, 'width')
  const height = readDimension(root, 'height')
  const { minWidth, maxWidth, minHeight, maxHeight } = policy.canvas

  if (width < minWidth || width > maxWidth) {
    throw new ComplianceError('canvas.width', `${width}px is outside ${minWidth}-${maxWidth}px`)
  }
  if (height < minHeight || height > maxHeight) {
    throw new ComplianceError('canvas.height', `${height}px is outside ${minHeight}-${maxHeight}px`)
  }
  return { width, height }
}
