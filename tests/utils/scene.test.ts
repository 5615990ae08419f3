import { describe, it, expect } from 'vitest'
import { childElements, circle, createElement, textContent } from '../../src/utils/elementModel'
import {
  DuplicateLayerError,
  InvalidElementError,
  InvalidOptionError,
  UnknownLayerError,
} from '../../src/utils/errors'
import { Scene } from '../../src/utils/scene'
import { parseDocument } from '../../src/utils/svgSerializer'
import type { SvgElement } from '../../src/types/svg'

function gradient(id: string) {
  return createElement('linearGradient', { id }, [
    createElement('stop', { offset: '0', 'stop-color': '#ff0000' }),
  ])
}

describe('Scene', () => {
  it('renders background before foreground regardless of creation order', () => {
    const scene = new Scene(800, 600, { maxSizeKb: 10 })
    scene.createLayer('foreground', 10)
    scene.createLayer('background', 0)
    scene.addToLayer('foreground', 'circle', { cx: 400, cy: 300, r: 50, fill: '#ff0000' })
    scene.addToLayer('background', 'rect', { x: 0, y: 0, width: 800, height: 600, fill: '#ffffff' })

    expect(scene.generateSvg()).toBe(
      [
        '<svg xmlns="http://www.w3.org/2000/svg" width="800" height="600" viewBox="0 0 800 600">',
        '  <g id="background">',
        '    <rect x="0" y="0" width="800" height="600" fill="#ffffff"/>',
        '  </g>',
        '  <g id="foreground">',
        '    <circle cx="400" cy="300" r="50" fill="#ff0000"/>',
        '  </g>',
        '</svg>',
      ].join('\n')
    )
    expect(scene.validate()).toBe(true)
  })

  it('breaks zIndex ties by creation order', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('a', 5)
    scene.createLayer('b', 1)
    scene.createLayer('c', 5)
    expect(scene.layerNames()).toEqual(['b', 'a', 'c'])
  })

  it('keeps insertion order within a layer', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('dots')
    scene.appendToLayer('dots', circle(1, 1, 1), circle(2, 2, 1))
    scene.addToLayer('dots', 'circle', { cx: 3, cy: 3, r: 1 })

    const layer = childElements(parseDocument(scene.generateSvg()))[0]
    expect(childElements(layer).map(c => c.attributes.get('cx'))).toEqual(['1', '2', '3'])
  })

  it('raises DuplicateLayerError on a repeated name', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('bg', 0)
    expect(() => scene.createLayer('bg', 0)).toThrow(DuplicateLayerError)
  })

  it('raises UnknownLayerError for an absent layer', () => {
    const scene = new Scene(100, 100)
    expect(() => scene.addToLayer('missing', 'rect', {})).toThrow(UnknownLayerError)
    expect(() => scene.appendToLayer('missing', circle(0, 0, 1))).toThrow(UnknownLayerError)
  })

  it('raises InvalidElementError for a bad tag or key', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('bg')
    expect(() => scene.addToLayer('bg', '', {})).toThrow(InvalidElementError)
    expect(() => scene.addToLayer('bg', 'rect', { '': '1' })).toThrow(InvalidElementError)
    expect(() => scene.addToLayer('bg', '1rect', {})).toThrow(InvalidElementError)
    expect(() => scene.addToLayer('bg', 'rect', [['2', 'x']])).toThrow(InvalidElementError)
    expect(scene.getLayer('bg')?.elements).toHaveLength(0)
  })

  it('validates elements that were not built by createElement', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('bg')
    const foreign: SvgElement = { kind: 'element', tag: '1x', attributes: new Map(), children: [] }
    expect(() => scene.appendToLayer('bg', foreign)).toThrow(InvalidElementError)
    expect(() => scene.registerDef(foreign)).toThrow(InvalidElementError)
    expect(scene.getLayer('bg')?.elements).toHaveLength(0)
  })

  it('keeps the layer unaffected by later changes to a foreign attribute map', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('bg')
    const attributes = new Map([['width', '10']])
    scene.appendToLayer('bg', { kind: 'element', tag: 'rect', attributes, children: [] })
    attributes.set('onload', 'run()')
    expect(scene.generateSvg()).toContain('<rect width="10"/>')
  })

  it('renders text with nested spans in order', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('label')
    scene.addToLayer('label', 'text', { x: 1, y: 2 }, ['Hello ', createElement('tspan', {}, ['big']), ' world'])

    const svg = scene.generateSvg()
    expect(svg).toBe(
      [
        '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="100" viewBox="0 0 100 100">',
        '  <g id="label">',
        '    <text x="1" y="2">Hello <tspan>big</tspan> world</text>',
        '  </g>',
        '</svg>',
      ].join('\n')
    )
    expect(textContent(parseDocument(svg))).toBe('Hello big world')
  })

  it('rejects invalid canvas and layer options', () => {
    expect(() => new Scene(0, 100)).toThrow(InvalidOptionError)
    expect(() => new Scene(100, 100, { maxSizeKb: -1 })).toThrow(InvalidOptionError)
    expect(() => new Scene(100, 100).createLayer('x', 1.5)).toThrow(InvalidOptionError)
  })

  it('emits defs first and only once per identical definition', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('bg')
    scene.addToLayer('bg', 'rect', { width: 10, height: 10, fill: 'url(#g1)' })
    const first = scene.registerDef(gradient('g1'))
    const second = scene.registerDef(gradient('g1'))
    scene.registerDef(gradient('g2'))

    expect(second).toBe(first)
    expect(scene.definitions).toHaveLength(2)

    const svg = scene.generateSvg()
    expect(svg.indexOf('<defs>')).toBeLessThan(svg.indexOf('<g id="bg">'))
  })

  it('is idempotent', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('bg')
    scene.addToLayer('bg', 'rect', { width: 10, height: 10 })
    expect(scene.generateSvg()).toBe(scene.generateSvg())
  })

  it('returns false from validate on a budget miss', () => {
    const scene = new Scene(100, 100, { maxSizeKb: 0.05 })
    scene.createLayer('bg')
    scene.addToLayer('bg', 'rect', { width: 10, height: 10 })
    expect(scene.validate()).toBe(false)
  })

  it('returns false from validate when the element ceiling is exceeded', () => {
    const scene = new Scene(100, 100, { maxElements: 2 })
    scene.createLayer('bg')
    scene.appendToLayer('bg', circle(1, 1, 1), circle(2, 2, 1), circle(3, 3, 1))
    expect(scene.elementCount).toBe(3)
    expect(scene.validate()).toBe(false)
  })

  it('returns false from validate for disallowed content', () => {
    const scene = new Scene(100, 100)
    scene.createLayer('fx')
    scene.addToLayer('fx', 'script', {})
    expect(scene.validate()).toBe(false)
  })

  it('returns false from validate for an out-of-range canvas', () => {
    expect(new Scene(20000, 100).validate()).toBe(false)
  })
})
