// src/main/core/conversation/pipeline.ts
import type {
  CapturedSelection,
  ConversationProvider,
  ConversationTurn,
  PipelineState,
  PresentationSurface,
  TurnRole,
} from '../../types'
import { validateTextInput } from '../../../utils/validation'
import { createLogger, preview } from '../../utils/logger'
import type { Mailbox } from '../../utils/async'
import type { EditHistory } from './edit-history'
import { classifyProviderError, ProviderError } from './errors'
import { buildFollowUpPrompt, buildInitialPrompt } from './prompts'
import { parseResponse, type ParsedReply } from './response-parser'

const logger = createLogger('Pipeline')

export const STATUS_PLACEHOLDER = 'Thinking...'
export const MAX_INPUT_LENGTH = 20_000

type RoundTripResult =
  | { ok: true; reply: ParsedReply }
  | { ok: false; error: ProviderError }

export interface ConversationPipelineOptions {
  selection: CapturedSelection
  provider: ConversationProvider
  history: EditHistory
  surface: PresentationSurface
  mailbox: Mailbox
}

/**
 * Runs one session's conversation, one round trip at a time.
 *
 * submit() and close() are called on the consumer. Provider calls run in the
 * background and hand their result back through the mailbox, so turns, history
 * and state only change on the consumer.
 */
export class ConversationPipeline {
  private readonly selection: CapturedSelection
  private readonly provider: ConversationProvider
  private readonly history: EditHistory
  private readonly surface: PresentationSurface
  private readonly mailbox: Mailbox

  private currentState: PipelineState = 'idle'
  private readonly log: ConversationTurn[] = []
  private nextSequence = 1
  private statusSequence: number | null = null
  private visibleSuggestion: string | null = null
  // set once a reply has been delivered; until then every submit carries the selection
  private primed = false
  private closed = false
  private inFlight: Promise<void> | null = null

  constructor(options: ConversationPipelineOptions) {
    this.selection = options.selection
    this.provider = options.provider
    this.history = options.history
    this.surface = options.surface
    this.mailbox = options.mailbox
  }

  get state(): PipelineState {
    return this.currentState
  }

  get turns(): readonly ConversationTurn[] {
    return this.log
  }

  get isAlive(): boolean {
    return !this.closed
  }

  /** The suggested edit currently offered for pasting, if any. */
  get suggestion(): string | null {
    return this.visibleSuggestion
  }

  get hasSuggestion(): boolean {
    return this.visibleSuggestion !== null
  }

  submit(userText: string): boolean {
    if (this.closed) {
      logger.warn('Submit on a closed session ignored')
      return false
    }
    if (this.currentState === 'awaiting-response') {
      logger.debug('Submit ignored, a response is still pending')
      return false
    }

    const validation = validateTextInput(userText, { allowEmpty: false, maxLength: MAX_INPUT_LENGTH })
    if (!validation.valid) {
      logger.warn(`Rejected input: ${validation.error}`)
      return false
    }
    const text = validation.sanitized

    this.appendTurn('user', text)
    this.statusSequence = this.appendTurn('status', STATUS_PLACEHOLDER).sequence
    this.clearSuggestion()
    this.surface.onInputEnabled(false)
    this.currentState = 'awaiting-response'

    const first = !this.primed
    logger.info(`Submitting ${first ? 'first' : 'follow-up'} message: "${preview(text)}"`)

    this.inFlight = this.roundTrip(text, first)
    return true
  }

  /** Offers `text` as the pasteable suggestion. */
  revealSuggestion(text: string) {
    this.visibleSuggestion = text
    this.surface.onSuggestionAvailable(text)
  }

  close() {
    if (this.closed) return
    this.closed = true
    logger.info('Session closed')
  }

  /** Resolves once the outstanding round trip has been delivered or dropped. */
  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve()
  }

  private async roundTrip(userText: string, first: boolean): Promise<void> {
    const result = await this.callProvider(userText, first)
    await this.mailbox.post(() => this.deliver(result))
  }

  private async callProvider(userText: string, first: boolean): Promise<RoundTripResult> {
    try {
      let prompt: string
      if (first) {
        this.provider.reset()
        prompt = buildInitialPrompt(this.selection.text, userText)
      } else {
        prompt = buildFollowUpPrompt(userText)
      }

      const reply = await this.provider.respond(prompt)
      if (!reply.trim()) {
        throw new ProviderError('empty-response', 'No response received from the language model service')
      }
      return { ok: true, reply: parseResponse(reply) }
    } catch (error) {
      const classified = classifyProviderError(error)
      logger.error(`Provider call failed (${classified.kind}):`, classified.message)
      return { ok: false, error: classified }
    }
  }

  private deliver(result: RoundTripResult) {
    if (this.closed) {
      logger.debug('Dropping result for closed session')
      this.inFlight = null
      return
    }

    this.removeStatus()

    if (result.ok) {
      this.primed = true
      const { displayText, suggestion } = result.reply
      this.appendTurn('assistant', displayText)
      if (suggestion !== null) {
        this.history.push(suggestion)
        this.revealSuggestion(suggestion)
      }
    } else {
      this.appendTurn('error', result.error.userMessage, result.error.title)
    }

    this.surface.onUndoEnabled(this.history.canUndo())
    this.currentState = 'idle'
    this.inFlight = null
    this.surface.onInputEnabled(true)
  }

  private appendTurn(role: TurnRole, text: string, title?: string): ConversationTurn {
    const turn: ConversationTurn = Object.freeze(
      title === undefined
        ? { role, text, sequence: this.nextSequence++ }
        : { role, text, sequence: this.nextSequence++, title }
    )
    this.log.push(turn)
    this.surface.onTurnAppended(turn)
    return turn
  }

  private removeStatus() {
    if (this.statusSequence === null) return
    const sequence = this.statusSequence
    this.statusSequence = null

    const index = this.log.findIndex(turn => turn.sequence === sequence)
    if (index !== -1) {
      this.log.splice(index, 1)
      this.surface.onTurnRemoved(sequence)
    }
  }

  private clearSuggestion() {
    if (this.visibleSuggestion === null) return
    this.visibleSuggestion = null
    this.surface.onSuggestionCleared()
  }
}
