// Shape builders for generator collaborators

import type { AttributeInput, AttributeValue, SvgElement } from '../../types/svg'
import { createElement, normalizeAttributes } from './elementModel'
import type { ExtraAttributes, Point } from './types'

/**
 * Geometry first, then caller attributes, so output reads the same
 * regardless of how the caller ordered their styling.
 */
function merge(geometry: Array<[string, AttributeValue]>, extra: ExtraAttributes = {}): Array<[string, string]> {
  const merged: Array<[string, string]> = geometry.map(([key, value]) => [key, String(value)])
  for (const [key, value] of normalizeAttributes(extra)) {
    const existing = merged.findIndex(([k]) => k === key)
    if (existing >= 0) {
      merged[existing] = [key, value]
    } else {
      merged.push([key, value])
    }
  }
  return merged
}

function formatPoints(points: readonly Point[]): string {
  return points.map(p => `${p.x},${p.y}`).join(' ')
}

export function circle(cx: number, cy: number, r: number, extra?: ExtraAttributes): SvgElement {
  return createElement('circle', merge([['cx', cx], ['cy', cy], ['r', r]], extra))
}

export function ellipse(cx: number, cy: number, rx: number, ry: number, extra?: ExtraAttributes): SvgElement {
  return createElement('ellipse', merge([['cx', cx], ['cy', cy], ['rx', rx], ['ry', ry]], extra))
}

export function rect(x: number, y: number, width: number, height: number, extra?: ExtraAttributes): SvgElement {
  return createElement('rect', merge([['x', x], ['y', y], ['width', width], ['height', height]], extra))
}

export function line(x1: number, y1: number, x2: number, y2: number, extra?: ExtraAttributes): SvgElement {
  return createElement('line', merge([['x1', x1], ['y1', y1], ['x2', x2], ['y2', y2]], extra))
}

export function path(d: string, extra?: ExtraAttributes): SvgElement {
  return createElement('path', merge([['d', d]], extra))
}

export function polygon(points: readonly Point[], extra?: ExtraAttributes): SvgElement {
  return createElement('polygon', merge([['points', formatPoints(points)]], extra))
}

export function polyline(points: readonly Point[], extra?: ExtraAttributes): SvgElement {
  return createElement('polyline', merge([['points', formatPoints(points)]], extra))
}

/**
 * Text element; content is escaped at serialization, not here
 */
export function text(x: number, y: number, content: string, extra?: ExtraAttributes): SvgElement {
  return createElement('text', merge([['x', x], ['y', y]], extra), [content])
}

export function group(children: readonly SvgElement[], attributes: AttributeInput = {}): SvgElement {
  return createElement('g', attributes, children)
}
