// src/main/core/clipboard/paste-applier.ts
import { createLogger, preview } from '../../utils/logger'
import { delay, type Sleep } from '../../utils/async'
import type { ForeignWindow, KeySender, WindowTracker } from '../../types'
import type { ClipboardGuard } from './clipboard-guard'

const logger = createLogger('PasteApplier')

export const ACTIVATION_SETTLE_MS = 500
export const PASTE_SETTLE_MS = 300
export const REFOCUS_DELAY_MS = 500
/** Upper bound on shift+left movements for very long text */
export const MAX_SELECT_MOVEMENTS = 1000
export const CLIPBOARD_RESTORE_DELAY_MS = 10_000

export interface PasteApplierOptions {
  sleep?: Sleep
  restoreDelayMs?: number
}

export class PasteApplier {
  private readonly sleep: Sleep
  private readonly restoreDelayMs: number

  constructor(
    private readonly guard: ClipboardGuard,
    private readonly keys: KeySender,
    private readonly windows: WindowTracker,
    options: PasteApplierOptions = {}
  ) {
    this.sleep = options.sleep ?? delay
    this.restoreDelayMs = options.restoreDelayMs ?? CLIPBOARD_RESTORE_DELAY_MS
  }

  /**
   * Pastes `text` into `target` and leaves the pasted span selected.
   * The previous clipboard comes back after a delay, unless the user has
   * copied something else in the meantime.
   */
  async apply(target: ForeignWindow | null, text: string): Promise<boolean> {
    if (!text) {
      logger.warn('Nothing to paste')
      return false
    }
    if (!target) {
      logger.warn('No source window to paste into')
      return false
    }

    const snapshot = await this.guard.acquire()

    try {
      await this.guard.write(text)

      const previous = await this.windows.getActiveWindow()
      await target.activate()
      await this.sleep(ACTIVATION_SETTLE_MS)

      await this.keys.sendChord('paste')
      await this.sleep(PASTE_SETTLE_MS)

      await this.keys.selectBackward(Math.min(codePointLength(text), MAX_SELECT_MOVEMENTS))

      await this.sleep(REFOCUS_DELAY_MS)
      if (previous && previous.id !== target.id) {
        await previous.activate()
      }
    } catch (error) {
      logger.error(`Paste into "${target.title}" failed:`, error instanceof Error ? error.message : error)
      await this.guard.release(snapshot)
      return false
    }

    this.guard.releaseAfter(snapshot, this.restoreDelayMs)
    logger.info(`Pasted ${text.length} characters into "${target.title}": "${preview(text)}"`)
    return true
  }
}

function codePointLength(text: string): number {
  return Array.from(text).length
}
