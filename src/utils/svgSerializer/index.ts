// Document serializer exports

export type { SerializeOptions, SceneSnapshot } from './types'

export { escapeAttribute, escapeText } from './escape'
export { serializeElement } from './serializeElement'
export { buildDocumentTree, serializeScene } from './serializeScene'
export { parseDocument } from './parseDocument'
