// src/main/core/session/chat-session.ts
import type {
  CapturedSelection,
  ConversationProvider,
  ConversationTurn,
  ForeignWindow,
  PasteAction,
  PipelineState,
  PresentationSurface,
} from '../../types'
import { createLogger } from '../../utils/logger'
import type { Mailbox } from '../../utils/async'
import type { PasteApplier } from '../clipboard/paste-applier'
import { EditHistory } from '../conversation/edit-history'
import { ConversationPipeline } from '../conversation/pipeline'

const logger = createLogger('ChatSession')

export const NO_CONTENT_REASON = 'No content to paste'
export const NO_SOURCE_WINDOW_REASON = 'No source window to paste into'
export const PASTE_FAILED_REASON = 'Paste failed'

export interface ChatSessionOptions {
  id: number
  selection: CapturedSelection
  sourceWindow: ForeignWindow | null
  provider: ConversationProvider
  surface: PresentationSurface
  pasteApplier: PasteApplier
  mailbox: Mailbox
  onClosed?: (session: ChatSession) => void
}

/**
 * One conversation about one captured selection, tied to the window the
 * selection came from.
 */
export class ChatSession {
  readonly id: number
  readonly selection: CapturedSelection
  readonly sourceWindow: ForeignWindow | null
  readonly history: EditHistory

  private readonly pipeline: ConversationPipeline
  private readonly surface: PresentationSurface
  private readonly pasteApplier: PasteApplier
  private readonly mailbox: Mailbox
  private readonly onClosed?: (session: ChatSession) => void
  private pasting = false

  constructor(options: ChatSessionOptions) {
    this.id = options.id
    this.selection = options.selection
    this.sourceWindow = options.sourceWindow
    this.surface = options.surface
    this.pasteApplier = options.pasteApplier
    this.mailbox = options.mailbox
    this.onClosed = options.onClosed
    this.history = new EditHistory(options.selection.text)
    this.pipeline = new ConversationPipeline({
      selection: options.selection,
      provider: options.provider,
      history: this.history,
      surface: options.surface,
      mailbox: options.mailbox,
    })
  }

  get state(): PipelineState {
    return this.pipeline.state
  }

  get turns(): readonly ConversationTurn[] {
    return this.pipeline.turns
  }

  get suggestion(): string | null {
    return this.pipeline.suggestion
  }

  get isAlive(): boolean {
    return this.pipeline.isAlive
  }

  get isPasting(): boolean {
    return this.pasting
  }

  submit(text: string): boolean {
    return this.pipeline.submit(text)
  }

  whenIdle(): Promise<void> {
    return this.pipeline.whenIdle()
  }

  /** Pastes the visible suggestion into the source window. */
  async paste(): Promise<boolean> {
    if (!this.isAlive) return false
    if (this.pasting) {
      logger.debug('Paste already in progress, ignoring')
      return false
    }

    const text = this.pipeline.suggestion
    if (!text) {
      this.surface.onPasteResult({ action: 'pasted', ok: false, reason: NO_CONTENT_REASON })
      return false
    }

    return this.applyToSource('pasted', text)
  }

  /**
   * Steps back one suggestion and writes the restored text into the source
   * window.
   */
  async undo(): Promise<boolean> {
    if (!this.isAlive || this.pasting) return false
    if (!this.history.canUndo()) {
      logger.debug('Nothing to undo')
      return false
    }

    const restored = this.history.pop()
    logger.info(`Undo, ${this.history.size} entries left`)
    this.pipeline.revealSuggestion(restored)
    this.surface.onUndoEnabled(this.history.canUndo())

    return this.applyToSource('undone', restored)
  }

  close() {
    if (!this.isAlive) return
    this.pipeline.close()
    logger.info(`Session ${this.id} closed`)
    this.onClosed?.(this)
  }

  private async applyToSource(action: PasteAction, text: string): Promise<boolean> {
    this.pasting = true
    try {
      const ok = await this.pasteApplier.apply(this.sourceWindow, text)
      await this.mailbox.post(() => this.deliverPasteResult(action, text, ok))
      return ok
    } finally {
      this.pasting = false
    }
  }

  private deliverPasteResult(action: PasteAction, text: string, ok: boolean) {
    if (!this.isAlive) return

    if (!ok) {
      const reason = this.sourceWindow ? PASTE_FAILED_REASON : NO_SOURCE_WINDOW_REASON
      this.surface.onPasteResult({ action, ok, reason })
      return
    }

    if (action === 'pasted' && this.history.push(text)) {
      this.surface.onUndoEnabled(this.history.canUndo())
    }
    this.surface.onPasteResult({ action, ok })
  }
}
