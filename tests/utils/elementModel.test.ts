import { describe, it, expect } from 'vitest'
import {
  AttributeMap,
  circle,
  countElements,
  createElement,
  elementsEqual,
  ensureElement,
  group,
  rect,
  text,
  textContent,
} from '../../src/utils/elementModel'
import type { SvgElement } from '../../src/types/svg'
import { InvalidElementError } from '../../src/utils/errors'

describe('createElement', () => {
  it('stringifies numbers and keeps insertion order', () => {
    const el = createElement('circle', { cx: 10, cy: 20.5, r: 3 })
    expect([...el.attributes.entries()]).toEqual([
      ['cx', '10'],
      ['cy', '20.5'],
      ['r', '3'],
    ])
  })

  it('keeps entry order', () => {
    const el = createElement('g', [['b', '1'], ['a', 'x']])
    expect([...el.attributes.keys()]).toEqual(['b', 'a'])
  })

  it('freezes the element and its children', () => {
    const el = createElement('g', {}, [createElement('rect')])
    expect(Object.isFrozen(el)).toBe(true)
    expect(Object.isFrozen(el.children)).toBe(true)
  })

  it('does not alias the caller children array', () => {
    const children = [createElement('rect')]
    const el = createElement('g', {}, children)
    children.push(createElement('circle'))
    expect(el.children).toHaveLength(1)
  })

  it('rejects an empty tag', () => {
    expect(() => createElement('')).toThrow(InvalidElementError)
  })

  it('rejects a tag containing markup characters', () => {
    expect(() => createElement('rect onload')).toThrow(InvalidElementError)
    expect(() => createElement('<g>')).toThrow(InvalidElementError)
  })

  it('rejects names that are not XML names', () => {
    expect(() => createElement('1rect')).toThrow(InvalidElementError)
    expect(() => createElement('a:b:c')).toThrow(InvalidElementError)
    expect(() => createElement('!x')).toThrow(InvalidElementError)
    expect(() => createElement('rect', [['2', 'x']])).toThrow(InvalidElementError)
    expect(() => createElement('rect', { '?x': 1 })).toThrow(InvalidElementError)
    expect(createElement('use', { 'xlink:href': '#a' }).attributes.get('xlink:href')).toBe('#a')
  })

  it('rejects an empty attribute key', () => {
    expect(() => createElement('rect', { '': 'x' })).toThrow(InvalidElementError)
  })

  it('rejects non-finite numbers', () => {
    expect(() => createElement('rect', { x: Number.NaN })).toThrow(InvalidElementError)
    expect(() => createElement('rect', { x: Infinity })).toThrow(InvalidElementError)
  })

  it('rejects duplicate keys in entry input', () => {
    expect(() => createElement('rect', [['x', 1], ['x', 2]])).toThrow(InvalidElementError)
  })

  it('omits empty text and merges adjacent text', () => {
    expect(createElement('text', {}, ['']).children).toHaveLength(0)
    expect(createElement('text', {}, ['a', 'b']).children).toEqual([{ kind: 'text', value: 'ab' }])
  })

  it('keeps text and elements in order', () => {
    const el = createElement('text', {}, ['Hello ', createElement('tspan', {}, ['big']), ' world'])
    expect(el.children.map(child => child.kind)).toEqual(['text', 'element', 'text'])
    expect(textContent(el)).toBe('Hello big world')
  })

  it('stores attributes in a map without mutators', () => {
    const el = createElement('rect', { x: 1 })
    expect(el.attributes).toBeInstanceOf(AttributeMap)
    expect('set' in el.attributes).toBe(false)
    expect('delete' in el.attributes).toBe(false)
  })
})

describe('ensureElement', () => {
  it('returns elements built by createElement as they are', () => {
    const el = createElement('rect')
    expect(ensureElement(el)).toBe(el)
  })

  it('rebuilds and validates foreign element objects', () => {
    const foreign: SvgElement = { kind: 'element', tag: 'rect', attributes: new Map([['x', '1']]), children: [] }
    const adopted = ensureElement(foreign)
    expect(adopted).not.toBe(foreign)
    expect(adopted.attributes).toBeInstanceOf(AttributeMap)
    expect(adopted.attributes.get('x')).toBe('1')

    const invalid: SvgElement = { kind: 'element', tag: '1x', attributes: new Map(), children: [] }
    expect(() => ensureElement(invalid)).toThrow(InvalidElementError)
  })
})

describe('elementsEqual', () => {
  it('ignores attribute order', () => {
    const a = createElement('stop', { offset: '0', 'stop-color': '#fff' })
    const b = createElement('stop', [['stop-color', '#fff'], ['offset', '0']])
    expect(elementsEqual(a, b)).toBe(true)
  })

  it('compares children and text', () => {
    expect(elementsEqual(group([rect(0, 0, 1, 1)]), group([rect(0, 0, 1, 2)]))).toBe(false)
    expect(elementsEqual(text(0, 0, 'a'), text(0, 0, 'b'))).toBe(false)
  })
})

describe('factory', () => {
  it('puts geometry before styling', () => {
    const el = circle(1, 2, 3, { fill: 'red' })
    expect(el.tag).toBe('circle')
    expect([...el.attributes.keys()]).toEqual(['cx', 'cy', 'r', 'fill'])
  })

  it('lets extra attributes override geometry in place', () => {
    const el = rect(0, 0, 10, 10, { x: 5, fill: 'blue' })
    expect([...el.attributes.entries()]).toEqual([
      ['x', '5'],
      ['y', '0'],
      ['width', '10'],
      ['height', '10'],
      ['fill', 'blue'],
    ])
  })

  it('builds text with content', () => {
    const el = text(5, 6, 'Hello')
    expect(textContent(el)).toBe('Hello')
    expect(el.attributes.get('x')).toBe('5')
  })

  it('counts descendants', () => {
    expect(countElements(group([circle(0, 0, 1), group([rect(0, 0, 1, 1)])]))).toBe(4)
  })
})
