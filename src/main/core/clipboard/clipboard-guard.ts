// src/main/core/clipboard/clipboard-guard.ts
import { createLogger, preview } from '../../utils/logger'
import { SerialQueue } from '../../utils/async'
import type { ClipboardAccess } from './system-clipboard'

const logger = createLogger('ClipboardGuard')

export interface ClipboardSnapshot {
  readonly id: number
  /** null when the clipboard could not be read; nothing is restored then */
  readonly text: string | null
  readonly takenAt: number
}

interface ActiveLease {
  snapshot: ClipboardSnapshot
  release: () => void
}

interface PendingRestore {
  snapshot: ClipboardSnapshot
  expected: string
  timer: NodeJS.Timeout
}

/**
 * Exclusive, restorable ownership of the process-wide clipboard.
 *
 * Acquisitions are served one at a time in arrival order. Every snapshot is
 * restored exactly once: by release(), or later by releaseAfter() when the
 * clipboard still holds what this guard last wrote. A scheduled restore is
 * flushed before the next acquisition reads the clipboard.
 */
export class ClipboardGuard {
  private queue = new SerialQueue()
  private active: ActiveLease | null = null
  private pending: PendingRestore | null = null
  private lastWritten: string | null = null
  private nextId = 1

  constructor(private readonly clipboard: ClipboardAccess) { }

  async acquire(): Promise<ClipboardSnapshot> {
    const release = await this.queue.acquire()

    await this.runPendingRestore()
    const text = await this.readSafely()

    const snapshot: ClipboardSnapshot = Object.freeze({
      id: this.nextId++,
      text,
      takenAt: Date.now(),
    })
    this.active = { snapshot, release }
    this.lastWritten = null
    logger.debug(`Acquired clipboard (snapshot ${snapshot.id}, ${text === null ? 'unreadable' : `${text.length} chars`})`)
    return snapshot
  }

  /**
   * Restores the snapshot now and hands the clipboard to the next waiter.
   */
  async release(snapshot: ClipboardSnapshot): Promise<void> {
    const lease = this.takeActive(snapshot)
    if (!lease) return

    try {
      await this.restore(snapshot.text)
    } finally {
      lease.release()
    }
  }

  /**
   * Hands the clipboard over now and restores the snapshot after `ms`, unless
   * the clipboard no longer holds the value this guard last wrote.
   */
  releaseAfter(snapshot: ClipboardSnapshot, ms: number): void {
    const lease = this.takeActive(snapshot)
    if (!lease) return

    if (snapshot.text !== null && this.lastWritten !== null) {
      const timer = setTimeout(() => this.onRestoreTimer(), ms)
      this.pending = { snapshot, expected: this.lastWritten, timer }
      logger.debug(`Clipboard restore for snapshot ${snapshot.id} scheduled in ${ms}ms`)
    } else {
      logger.debug(`Nothing to restore later for snapshot ${snapshot.id}`)
    }

    lease.release()
  }

  /**
   * Scoped acquisition: the snapshot is restored on every exit path unless the
   * operation already released it or scheduled a delayed release.
   */
  async withClipboard<T>(operation: (snapshot: ClipboardSnapshot) => Promise<T>): Promise<T> {
    const snapshot = await this.acquire()
    try {
      return await operation(snapshot)
    } finally {
      if (this.active?.snapshot === snapshot) {
        await this.release(snapshot)
      }
    }
  }

  async read(): Promise<string> {
    return this.clipboard.readText()
  }

  async write(text: string): Promise<void> {
    await this.clipboard.writeText(text)
    this.lastWritten = text
  }

  get hasPendingRestore(): boolean {
    return this.pending !== null
  }

  /**
   * Runs a scheduled restore immediately, with the same non-clobber check.
   */
  async flushPendingRestore(): Promise<void> {
    if (!this.pending) return
    await this.queue.run(() => this.runPendingRestore())
  }

  private onRestoreTimer() {
    this.queue.run(() => this.runPendingRestore()).catch(error => {
      logger.error('Delayed clipboard restore failed:', error)
    })
  }

  private async runPendingRestore(): Promise<void> {
    const pending = this.pending
    if (!pending) return
    this.pending = null
    clearTimeout(pending.timer)

    const current = await this.readSafely()
    if (current !== pending.expected) {
      logger.info('Clipboard changed since it was written, keeping the newer content')
      return
    }

    await this.restore(pending.snapshot.text)
    logger.info('Original clipboard content restored after timeout')
  }

  private takeActive(snapshot: ClipboardSnapshot): ActiveLease | null {
    if (!this.active || this.active.snapshot !== snapshot) {
      logger.warn(`Snapshot ${snapshot.id} is not the active lease, ignoring release`)
      return null
    }
    const lease = this.active
    this.active = null
    return lease
  }

  private async restore(text: string | null): Promise<void> {
    if (text === null) {
      logger.debug('No original clipboard content to restore')
      return
    }
    try {
      await this.clipboard.writeText(text)
      logger.debug(`Restored clipboard: "${preview(text)}"`)
    } catch (error) {
      logger.error('Failed to restore clipboard', error)
    }
  }

  private async readSafely(): Promise<string | null> {
    try {
      return await this.clipboard.readText()
    } catch (error) {
      logger.error('Failed to read clipboard', error)
      return null
    }
  }
}
