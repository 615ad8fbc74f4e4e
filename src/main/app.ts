// src/main/app.ts
import type { AssistantConfig, ConversationProvider, PresentationSurface } from './types'
import { ClipboardGuard } from './core/clipboard/clipboard-guard'
import { PasteApplier } from './core/clipboard/paste-applier'
import { SelectionCapture } from './core/clipboard/selection-capture'
import { SystemClipboard, type ClipboardAccess } from './core/clipboard/system-clipboard'
import { GroqConversationProvider } from './core/conversation/groq-provider'
import { GlobalHotkeyListener, HotkeyDebouncer } from './core/input/hotkey'
import { createPlatformInput, type PlatformInput } from './core/input/platform'
import type { ChatSession } from './core/session/chat-session'
import { SessionManager } from './core/session/session-manager'
import { Mailbox, type Sleep } from './utils/async'
import { createLogger } from './utils/logger'

const logger = createLogger('App')

/** Presentation side of the app: renders one attached session at a time. */
export interface SessionHost extends PresentationSurface {
  attach(session: ChatSession): void
  reportNothingSelected(): void
}

export type ProviderFactory = (config: AssistantConfig) => ConversationProvider

export const createGroqProvider: ProviderFactory = config => new GroqConversationProvider({
  apiKey: config.apiKey,
  modelName: config.modelName,
  systemPrompt: config.systemPrompt,
  temperature: config.temperature,
})

export interface AssistantAppOptions {
  config: AssistantConfig
  host: SessionHost
  clipboard?: ClipboardAccess
  input?: PlatformInput
  providerFactory?: ProviderFactory
  mailbox?: Mailbox
  sleep?: Sleep
}

/**
 * Wires hotkey, capture, sessions and paste together.
 */
export class AssistantApp {
  readonly guard: ClipboardGuard
  readonly sessions = new SessionManager()
  readonly debouncer: HotkeyDebouncer

  private readonly config: AssistantConfig
  private readonly host: SessionHost
  private readonly input: PlatformInput
  private readonly capture: SelectionCapture
  private readonly pasteApplier: PasteApplier
  private readonly providerFactory: ProviderFactory
  private readonly mailbox: Mailbox
  private readonly listener: GlobalHotkeyListener

  constructor(options: AssistantAppOptions) {
    this.config = options.config
    this.host = options.host
    this.input = options.input ?? createPlatformInput()
    this.providerFactory = options.providerFactory ?? createGroqProvider
    this.mailbox = options.mailbox ?? new Mailbox()

    this.guard = new ClipboardGuard(options.clipboard ?? new SystemClipboard())
    this.capture = new SelectionCapture(this.guard, this.input.keys, { sleep: options.sleep })
    this.pasteApplier = new PasteApplier(this.guard, this.input.keys, this.input.windows, { sleep: options.sleep })

    this.debouncer = new HotkeyDebouncer(async () => {
      await this.onHotkey()
    })
    this.listener = new GlobalHotkeyListener(this.config.hotkey, this.debouncer)
  }

  async start(): Promise<void> {
    await this.listener.start()
    logger.info(`Ready, model ${this.config.modelName}`)
  }

  /**
   * Captures the foreground selection and opens a session for it. Older
   * sessions are closed; only the newest one stays attached.
   */
  async onHotkey(): Promise<ChatSession | null> {
    logger.info('Hotkey pressed, capturing selection')
    const sourceWindow = await this.input.windows.getActiveWindow()
    const selection = await this.capture.capture()

    if (!selection) {
      this.host.reportNothingSelected()
      return null
    }

    this.sessions.closeAll()
    const session = this.sessions.create({
      selection,
      sourceWindow,
      provider: this.providerFactory(this.config),
      surface: this.host,
      pasteApplier: this.pasteApplier,
      mailbox: this.mailbox,
    })
    this.host.attach(session)
    return session
  }

  async shutdown(): Promise<void> {
    logger.info('Shutting down')
    this.listener.stop()
    this.debouncer.dispose()
    this.sessions.closeAll()
    await this.guard.flushPendingRestore()
  }
}
