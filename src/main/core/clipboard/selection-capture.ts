// src/main/core/clipboard/selection-capture.ts
import { createLogger, preview } from '../../utils/logger'
import { delay, type Sleep } from '../../utils/async'
import type { CapturedSelection, KeySender } from '../../types'
import type { ClipboardGuard } from './clipboard-guard'

const logger = createLogger('SelectionCapture')

/**
 * One way of asking the foreground application to copy its selection.
 * Applications with unusual key handling or slow input processing need
 * different interactions, so capture walks an ordered list of these.
 */
export type CopyStrategy =
  | { kind: 'chord' }
  | { kind: 'held-chord'; stepDelayMs: number }
  | { kind: 'chord-with-settle'; extraDelayMs: number }

export const DEFAULT_COPY_STRATEGIES: readonly CopyStrategy[] = [
  { kind: 'chord' },
  { kind: 'held-chord', stepDelayMs: 100 },
  { kind: 'chord-with-settle', extraDelayMs: 500 },
]

/** Wait after each attempt before reading the clipboard. */
export const CLIPBOARD_SETTLE_MS = 300

export interface SelectionCaptureOptions {
  strategies?: readonly CopyStrategy[]
  settleMs?: number
  sleep?: Sleep
}

export class SelectionCapture {
  private readonly strategies: readonly CopyStrategy[]
  private readonly settleMs: number
  private readonly sleep: Sleep

  constructor(
    private readonly guard: ClipboardGuard,
    private readonly keys: KeySender,
    options: SelectionCaptureOptions = {}
  ) {
    this.strategies = options.strategies ?? DEFAULT_COPY_STRATEGIES
    this.settleMs = options.settleMs ?? CLIPBOARD_SETTLE_MS
    this.sleep = options.sleep ?? delay
  }

  /**
   * Copies the foreground selection and diffs the clipboard against its
   * previous content. Returns null when no strategy changed the clipboard.
   * The previous clipboard content is restored before returning. When it could
   * not be read, the copied text stays on the clipboard.
   */
  async capture(): Promise<CapturedSelection | null> {
    return this.guard.withClipboard(async snapshot => {
      const before = snapshot.text ?? ''
      if (snapshot.text === null) {
        logger.warn('Clipboard was unreadable before copying, it will not be restored')
      }
      logger.debug(`Original clipboard content length: ${before.length} characters`)

      for (const [index, strategy] of this.strategies.entries()) {
        const attempt = index + 1
        logger.debug(`Trying copy strategy ${attempt} (${strategy.kind})`)

        let current: string
        try {
          await this.perform(strategy)
          await this.sleep(this.settleMs)
          current = await this.guard.read()
        } catch (error) {
          logger.warn(`Copy strategy ${attempt} (${strategy.kind}) failed:`, error instanceof Error ? error.message : error)
          continue
        }

        if (current && current !== before) {
          logger.info(`Copy strategy ${attempt} succeeded, got ${current.length} characters: "${preview(current)}"`)
          return Object.freeze({ text: current, capturedAt: Date.now() })
        }
      }

      logger.info('All copy strategies failed, no text was selected or the application does not support copy')
      return null
    })
  }

  private async perform(strategy: CopyStrategy): Promise<void> {
    switch (strategy.kind) {
      case 'chord':
        await this.keys.sendChord('copy')
        return
      case 'held-chord':
        await this.keys.keyDown('modifier')
        try {
          await this.sleep(strategy.stepDelayMs)
          await this.keys.keyDown('c')
          await this.sleep(strategy.stepDelayMs)
          await this.keys.keyUp('c')
          await this.sleep(strategy.stepDelayMs)
        } finally {
          await this.keys.keyUp('modifier')
        }
        return
      case 'chord-with-settle':
        await this.keys.sendChord('copy')
        await this.sleep(strategy.extraDelayMs)
        return
    }
  }
}
