// Layered scene graph

import type { AttributeInput, ChildInput, SvgElement } from '../../types/svg'
import { countElements, createElement, elementKey, ensureElement } from '../elementModel'
import { DuplicateLayerError, InvalidElementError, InvalidOptionError, UnknownLayerError } from '../errors'
import { DEFAULT_COMPLIANCE_POLICY, isCompliant } from '../compliance'
import type { CompliancePolicy } from '../compliance'
import { optimizeDocument } from '../svgOptimizer'
import { serializeScene } from '../svgSerializer'
import type { SceneSnapshot } from '../svgSerializer'
import type { Layer, SceneOptions } from './types'

interface LayerState {
  readonly name: string
  readonly zIndex: number
  readonly order: number
  readonly elements: SvgElement[]
}

function assertPositive(name: string, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new InvalidOptionError(`${name} must be a positive number, got ${value}`)
  }
}

/**
 * One generation unit: a canvas, its shared definitions and its layers.
 * Not safe for concurrent mutation; use one Scene per unit of work.
 */
export class Scene {
  readonly width: number
  readonly height: number
  readonly maxSizeKb?: number
  readonly maxElements?: number
  private readonly policy: CompliancePolicy
  private readonly layers = new Map<string, LayerState>()
  private readonly defs: SvgElement[] = []
  private readonly defKeys = new Set<string>()

  constructor(width: number, height: number, options: SceneOptions = {}) {
    assertPositive('width', width)
    assertPositive('height', height)
    if (options.maxSizeKb !== undefined) {
      assertPositive('maxSizeKb', options.maxSizeKb)
    }
    if (options.maxElements !== undefined && !(Number.isInteger(options.maxElements) && options.maxElements >= 0)) {
      throw new InvalidOptionError(`maxElements must be a non-negative integer, got ${options.maxElements}`)
    }

    this.width = width
    this.height = height
    this.maxSizeKb = options.maxSizeKb
    this.maxElements = options.maxElements
    this.policy = options.policy ?? DEFAULT_COMPLIANCE_POLICY
  }

  /**
   * Insert an empty layer. Equal zIndex values render in creation order.
   */
  createLayer(name: string, zIndex = 0): Layer {
    if (typeof name !== 'string' || name.length === 0) {
      throw new InvalidElementError('Layer name must be a non-empty string')
    }
    if (!Number.isInteger(zIndex)) {
      throw new InvalidOptionError(`zIndex must be an integer, got ${zIndex}`)
    }
    if (this.layers.has(name)) {
      throw new DuplicateLayerError(name)
    }

    const layer: LayerState = { name, zIndex, order: this.layers.size, elements: [] }
    this.layers.set(name, layer)
    return this.view(layer)
  }

  /**
   * Build an element and append it to a layer
   */
  addToLayer(
    name: string,
    tag: string,
    attributes: AttributeInput = {},
    children: readonly ChildInput[] = []
  ): SvgElement {
    const layer = this.requireLayer(name)
    const element = createElement(tag, attributes, children)
    layer.elements.push(element)
    return element
  }

  /**
   * Append elements produced elsewhere (renderers, the element factory).
   * Elements not built by createElement are validated and copied first.
   */
  appendToLayer(name: string, ...elements: SvgElement[]): void {
    const layer = this.requireLayer(name)
    layer.elements.push(...elements.map(ensureElement))
  }

  /**
   * Add a shared resource. A structurally identical definition is only
   * kept once; the one already registered is returned.
   */
  registerDef(definition: SvgElement): SvgElement {
    const element = ensureElement(definition)
    const key = elementKey(element)
    if (this.defKeys.has(key)) {
      const existing = this.defs.find(def => elementKey(def) === key)
      if (existing) return existing
    }
    this.defKeys.add(key)
    this.defs.push(element)
    return element
  }

  getLayer(name: string): Layer | undefined {
    const layer = this.layers.get(name)
    return layer ? this.view(layer) : undefined
  }

  /** Layer names in render order */
  layerNames(): string[] {
    return this.orderedLayers().map(layer => layer.name)
  }

  get definitions(): readonly SvgElement[] {
    return [...this.defs]
  }

  /** Layer elements, descendants included */
  get elementCount(): number {
    let count = 0
    for (const layer of this.layers.values()) {
      for (const element of layer.elements) {
        count += countElements(element)
      }
    }
    return count
  }

  snapshot(): SceneSnapshot {
    return {
      width: this.width,
      height: this.height,
      defs: [...this.defs],
      layers: this.orderedLayers().map(layer => ({ name: layer.name, elements: [...layer.elements] })),
    }
  }

  /**
   * Render the scene. Does not touch scene state; the same scene always
   * produces the same text.
   */
  generateSvg(): string {
    return serializeScene(this.snapshot())
  }

  /**
   * True when the document is compliant, fits the element ceiling and,
   * with a budget set, can be optimized within it. A miss returns false.
   */
  validate(): boolean {
    if (this.maxElements !== undefined && this.elementCount > this.maxElements) {
      return false
    }

    const document = this.generateSvg()
    if (!isCompliant(document, this.policy)) {
      return false
    }
    if (this.maxSizeKb === undefined) {
      return true
    }
    return optimizeDocument(document, this.maxSizeKb).metBudget
  }

  private requireLayer(name: string): LayerState {
    const layer = this.layers.get(name)
    if (!layer) {
      throw new UnknownLayerError(name)
    }
    return layer
  }

  private orderedLayers(): LayerState[] {
    return [...this.layers.values()].sort((a, b) => a.zIndex - b.zIndex || a.order - b.order)
  }

  private view(layer: LayerState): Layer {
    return Object.freeze({
      name: layer.name,
      zIndex: layer.zIndex,
      order: layer.order,
      elements: Object.freeze([...layer.elements]),
    })
  }
}
