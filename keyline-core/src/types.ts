import type { LoadError, LoadResult, SceneOptions, SimTime } from '@keyline/engine'

export interface KeylineOptions {
  /**
   * Scene description to load on creation
   */
  scene?: unknown

  /**
   * Options for the underlying scene
   */
  sceneOptions?: SceneOptions

  /**
   * Simulated seconds per second of step time
   */
  playbackRate?: number

  /**
   * Start playing immediately
   */
  autoplay?: boolean
}

export interface KeylineState {
  sceneName: string | null
  currentTime: SimTime
  playing: boolean
  playbackRate: number
  // Entity names in update order
  entities: string[]
}

export interface KeylineEventMap {
  'scene-loaded': LoadResult
  // Entities skipped while loading, or the failure that stopped the load
  'load-error': LoadError | { error: unknown }
  tick: { time: SimTime; deltaTime: SimTime }
  'time-changed': { time?: SimTime; playing?: boolean }
  'order-changed': { order: string[] }
}

export type KeylineEvent = keyof KeylineEventMap

export type EventListener<E extends KeylineEvent> = (payload: KeylineEventMap[E]) => void
