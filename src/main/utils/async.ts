// src/main/utils/async.ts
import { createLogger } from './logger'

const logger = createLogger('Async')

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export type Sleep = (ms: number) => Promise<void>

/**
 * FIFO mutual exclusion. Holders are served strictly in arrival order.
 */
export class SerialQueue {
  private waiters: Array<() => void> = []
  private held = false

  /**
   * Resolves with a release function once every earlier holder has released.
   * Calling the release function more than once has no effect.
   */
  acquire(): Promise<() => void> {
    return new Promise(resolve => {
      this.waiters.push(() => resolve(this.createRelease()))
      this.drain()
    })
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await task()
    } finally {
      release()
    }
  }

  get isHeld(): boolean {
    return this.held
  }

  get pending(): number {
    return this.waiters.length
  }

  private createRelease(): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      this.held = false
      this.drain()
    }
  }

  private drain() {
    if (this.held) return
    const next = this.waiters.shift()
    if (next) {
      this.held = true
      next()
    }
  }
}

export type Scheduler = (task: () => void) => void

const nextTurn: Scheduler = task => {
  setImmediate(task)
}

/**
 * Post-to-consumer channel. Background tasks post handlers; the handlers run
 * later, one after another, on their own turn of the event loop. The promise
 * returned by post() settles after the handler ran.
 */
export class Mailbox {
  private queue: Array<{ handler: () => void; done: () => void }> = []
  private scheduled = false

  constructor(private readonly schedule: Scheduler = nextTurn) { }

  post(handler: () => void): Promise<void> {
    return new Promise(resolve => {
      this.queue.push({ handler, done: resolve })
      this.wake()
    })
  }

  get size(): number {
    return this.queue.length
  }

  private wake() {
    if (this.scheduled) return
    this.scheduled = true
    this.schedule(() => this.drain())
  }

  private drain() {
    this.scheduled = false
    const batch = this.queue.splice(0)
    for (const message of batch) {
      try {
        message.handler()
      } catch (error) {
        logger.error('Consumer handler failed:', error)
      } finally {
        message.done()
      }
    }
  }
}
