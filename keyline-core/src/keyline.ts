/**
 * Main Keyline class - Programmatic API for driving a scene
 *
 * Wraps a Scene with playback state and an event API, so a host application can
 * load a scene, advance it from its own frame loop and read entity frames back.
 */

import { type Frame, type LoadResult, loadScene, Scene, type SimTime } from '@keyline/engine'
import { filter, type Subscription } from 'rxjs'

import type {
  EventListener,
  KeylineEvent,
  KeylineEventMap,
  KeylineOptions,
  KeylineState,
} from './types'

type ListenerTable = { [E in KeylineEvent]: Set<EventListener<E>> }

/**
 * Keyline - Main API class for programmatic control
 *
 * @example
 * ```ts
 * const keyline = Keyline.create({ scene: description, autoplay: true })
 *
 * keyline.on('tick', ({ time }) => render(keyline.frameOf('Camera'), time))
 *
 * // from the host frame loop
 * keyline.step(1 / 60)
 * ```
 */
export class Keyline {
  readonly scene: Scene
  private state: KeylineState
  private listeners: ListenerTable = {
    'scene-loaded': new Set(),
    'load-error': new Set(),
    tick: new Set(),
    'time-changed': new Set(),
    'order-changed': new Set(),
  }
  private subs: Subscription[] = []

  private constructor(options: KeylineOptions = {}) {
    this.scene = new Scene(options.sceneOptions)
    this.state = {
      sceneName: null,
      currentTime: 0,
      playing: options.autoplay ?? false,
      playbackRate: options.playbackRate ?? 1,
      entities: [],
    }

    this.subs.push(
      this.scene.events
        .pipe(filter(event => event.type === 'sorted'))
        .subscribe(() => {
          this.state.entities = this.entityNames()
          this.emit('order-changed', { order: this.state.entities })
        })
    )

    if (options.scene !== undefined) {
      this.loadScene(options.scene)
    }
  }

  /**
   * Create a new Keyline instance
   */
  static create(options?: KeylineOptions): Keyline {
    return new Keyline(options)
  }

  /**
   * Get the current state
   */
  getState(): Readonly<KeylineState> {
    return { ...this.state, entities: [...this.state.entities] }
  }

  /**
   * Replace the scene contents with a scene description
   */
  loadScene(description: unknown): LoadResult {
    let result: LoadResult
    try {
      result = loadScene(this.scene, description)
    } catch (error) {
      this.emit('load-error', { error })
      throw error
    }

    for (const skipped of result.errors) {
      this.emit('load-error', skipped)
    }
    this.state.sceneName = result.name ?? null
    this.state.currentTime = this.scene.time
    this.state.entities = this.entityNames()
    this.emit('scene-loaded', result)
    return result
  }

  /**
   * Advance the simulation by deltaTime seconds, scaled by the playback rate.
   * Does nothing while paused unless forced.
   */
  step(deltaTime: SimTime, force = false): void {
    if (!this.state.playing && !force) return

    const scaled = deltaTime * this.state.playbackRate
    this.scene.onSimulation(scaled)
    this.state.currentTime = this.scene.time
    this.emit('tick', { time: this.state.currentTime, deltaTime: scaled })
  }

  /**
   * Jump to a time without carrying velocity across the jump
   */
  seekTo(time: SimTime): void {
    this.scene.setTime(time)
    this.state.currentTime = this.scene.time
    this.emit('time-changed', { time })
  }

  /**
   * Start playback
   */
  play(): void {
    this.state.playing = true
    this.emit('time-changed', { playing: true })
  }

  /**
   * Pause playback
   */
  pause(): void {
    this.state.playing = false
    this.emit('time-changed', { playing: false })
  }

  setPlaybackRate(rate: number): void {
    this.state.playbackRate = rate
  }

  /**
   * Current frame of an entity, if it exists
   */
  frameOf(name: string): Frame | undefined {
    return this.scene.entity(name)?.frame
  }

  private entityNames(): string[] {
    return this.scene.entities.map(entity => entity.name)
  }

  /**
   * Add an event listener
   */
  on<E extends KeylineEvent>(event: E, listener: EventListener<E>): void {
    this.listeners[event].add(listener)
  }

  /**
   * Remove an event listener
   */
  off<E extends KeylineEvent>(event: E, listener: EventListener<E>): void {
    this.listeners[event].delete(listener)
  }

  private emit<E extends KeylineEvent>(event: E, payload: KeylineEventMap[E]): void {
    for (const listener of this.listeners[event]) {
      listener(payload)
    }
  }

  /**
   * Clean up resources
   */
  destroy(): void {
    for (const sub of this.subs) sub.unsubscribe()
    this.subs = []
    for (const set of Object.values(this.listeners)) set.clear()
    this.scene.destroy()
  }
}
