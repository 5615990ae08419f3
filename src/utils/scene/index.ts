// Scene graph exports

export type { Layer, SceneOptions } from './types'
export { Scene } from './scene'
