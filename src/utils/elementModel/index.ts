// Element model exports

export type { Point, ExtraAttributes } from './types'

export { AttributeMap } from './attributeMap'

export {
  createElement,
  createText,
  ensureElement,
  isElement,
  isText,
  childElements,
  textContent,
  normalizeAttributes,
  withChanges,
  elementKey,
  elementsEqual,
  countElements,
} from './elementModel'

export {
  circle,
  ellipse,
  rect,
  line,
  path,
  polygon,
  polyline,
  text,
  group,
} from './factory'
