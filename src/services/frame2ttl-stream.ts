// * Sample Stream Monitor
// * Headless live view over a streaming Frame2TTL session.
// * - Polls the session on a timer and never blocks on the link
// * - Keeps every sample acquired (up to a cap) plus a fixed-size display window that restarts when full
// * EVENT EMISSION: 'samples' (number[] batch), 'window-reset', 'error' (only when a listener is attached)

import EventEmitter from 'events'

import { ModeError } from './frame2ttl-protocol'
import { type Frame2TTL, SessionState } from './frame2ttl-session'
import { createLogger } from './logger'

const logger = createLogger('StreamMonitor')

/**
 * Overrides for the session's stream settings.
 */
export interface StreamMonitorOptions {
  /**
   *
   */
  pollIntervalMs?: number
  /**
   *
   */
  displayBufferSize?: number
  /**
   *
   */
  maxAcquiredSamples?: number
}

/**
 *
 */
export class SampleStreamMonitor extends EventEmitter {
  private readonly pollIntervalMs: number
  private readonly displayBufferSize: number
  private readonly maxAcquiredSamples: number

  private pollTimer: NodeJS.Timeout | null = null
  private starting = false
  private acquired: number[] = []
  private display: number[] = []
  private droppedSamples = 0

  /**
   *
   * @param session
   * @param options
   */
  constructor(
    private readonly session: Frame2TTL,
    options: StreamMonitorOptions = {}
  ) {
    super()
    this.pollIntervalMs = options.pollIntervalMs ?? session.settings.streamPollIntervalMs
    this.displayBufferSize = options.displayBufferSize ?? session.settings.displayBufferSize
    this.maxAcquiredSamples = options.maxAcquiredSamples ?? session.settings.maxAcquiredSamples
  }

  // ========================================================================
  // Timer hooks (protected for test injection)
  // ========================================================================

  /**
   *
   * @param callback
   * @param periodMs
   */
  protected scheduleInterval(callback: () => void, periodMs: number): NodeJS.Timeout {
    return setInterval(callback, periodMs)
  }

  /**
   *
   * @param handle
   */
  protected clearScheduledInterval(handle: NodeJS.Timeout): void {
    clearInterval(handle)
  }

  // ========================================================================
  // Public API
  // ========================================================================

  /**
   * Enable streaming and start polling. Clears samples from any previous run.
   */
  async start(): Promise<void> {
    if (this.pollTimer || this.starting) {
      throw new ModeError('Stream monitor is already running')
    }

    this.starting = true
    this.acquired = []
    this.display = []
    this.droppedSamples = 0

    try {
      await this.session.setStreaming(true)
      this.pollTimer = this.scheduleInterval(() => this.poll(), this.pollIntervalMs)
    } finally {
      this.starting = false
    }
    logger.info(`Started polling every ${this.pollIntervalMs}ms`)
  }

  /**
   * Stop polling and disable streaming; the session flushes what the device sent after the last poll.
   * Returns every sample acquired during the run.
   */
  async stop(): Promise<number[]> {
    this.haltPolling()

    if (this.session.getState() === SessionState.STREAMING) {
      await this.session.setStreaming(false)
    }

    if (this.droppedSamples > 0) {
      logger.warn(`Acquisition cap of ${this.maxAcquiredSamples} reached; ${this.droppedSamples} samples not kept`)
    }
    logger.info(`Stopped with ${this.acquired.length} samples acquired`)
    return [...this.acquired]
  }

  /**
   *
   */
  isRunning(): boolean {
    return this.pollTimer !== null
  }

  /**
   *
   */
  getAcquiredSamples(): number[] {
    return [...this.acquired]
  }

  /**
   * Samples shown since the display window last restarted, oldest first.
   */
  getDisplayWindow(): number[] {
    return [...this.display]
  }

  /**
   * Samples received after the acquisition cap was reached.
   */
  getDroppedSampleCount(): number {
    return this.droppedSamples
  }

  // ========================================================================
  // Internal Helpers
  // ========================================================================

  /**
   *
   */
  private poll(): void {
    let batch: number[]
    try {
      batch = this.session.readAvailableSamples()
    } catch (error) {
      logger.error('Polling failed, stopping monitor:', error)
      this.haltPolling()
      if (this.listenerCount('error') > 0) {
        this.emit('error', error)
      }
      return
    }

    if (batch.length === 0) {
      return
    }

    const room = Math.max(0, this.maxAcquiredSamples - this.acquired.length)
    const kept = Math.min(room, batch.length)
    for (let i = 0; i < kept; i++) {
      this.acquired.push(batch[i])
    }
    this.droppedSamples += batch.length - kept

    if (this.display.length + batch.length >= this.displayBufferSize) {
      this.display = []
      this.emit('window-reset')
    } else {
      for (const sample of batch) {
        this.display.push(sample)
      }
    }

    this.emit('samples', batch)
  }

  /**
   *
   */
  private haltPolling(): void {
    if (this.pollTimer) {
      this.clearScheduledInterval(this.pollTimer)
      this.pollTimer = null
    }
  }
}
