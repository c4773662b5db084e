/**
 * @keyline/core - Programmatic API for Keyline scenes
 *
 * Loads scene descriptions, plays them back from a host frame loop and reports
 * what happens through events. The scheduler and track language live in
 * @keyline/engine.
 */

export { Keyline } from './keyline'
export type {
  EventListener,
  KeylineEvent,
  KeylineEventMap,
  KeylineOptions,
  KeylineState,
} from './types'

export { sampleScene } from './utils/headless'
export type { SampleSceneOptions, SceneSample } from './utils/headless'
