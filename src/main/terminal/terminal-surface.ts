// src/main/terminal/terminal-surface.ts
import readline from 'node:readline'
import chalk, { type ChalkInstance } from 'chalk'
import type { ConversationTurn, PasteOutcome } from '../types'
import type { ChatSession } from '../core/session/chat-session'
import type { SessionHost } from '../app'
import { createLogger, preview } from '../utils/logger'

const logger = createLogger('Terminal')

export const HELP_LINES = [
  '/paste  apply the suggested edit to the source window',
  '/undo   step back to the previous text and apply it',
  '/close  end the current session',
  '/help   show this list',
]

export interface TerminalSurfaceOptions {
  hotkey: string
  write?: (line: string) => void
  colors?: ChalkInstance
  onExit?: () => void
}

/**
 * Line-oriented chat host. Renders the attached session's turns on stdout and
 * turns input lines into messages or commands.
 */
export class TerminalSurface implements SessionHost {
  private session: ChatSession | null = null
  private inputEnabled = true
  private undoEnabled = false
  private suggestion: string | null = null
  private rl: readline.Interface | null = null

  private readonly hotkey: string
  private readonly write: (line: string) => void
  private readonly c: ChalkInstance
  private readonly onExit?: () => void

  constructor(options: TerminalSurfaceOptions) {
    this.hotkey = options.hotkey
    this.write = options.write ?? (line => { process.stdout.write(`${line}\n`) })
    this.c = options.colors ?? chalk
    this.onExit = options.onExit
  }

  get current(): ChatSession | null {
    return this.session
  }

  get visibleSuggestion(): string | null {
    return this.suggestion
  }

  start(input: NodeJS.ReadableStream = process.stdin) {
    if (this.rl) return
    this.rl = readline.createInterface({ input })
    this.rl.on('line', line => {
      this.handleLine(line).catch(error => {
        logger.error('Failed to handle input line:', error)
      })
    })
    this.rl.on('close', () => {
      this.rl = null
      this.onExit?.()
    })
    this.write(this.c.dim(`Select text anywhere and press ${this.hotkey} to start.`))
  }

  stop() {
    const rl = this.rl
    this.rl = null
    rl?.close()
  }

  attach(session: ChatSession) {
    this.session = session
    this.inputEnabled = true
    this.undoEnabled = false
    this.suggestion = null

    const source = session.sourceWindow ? ` from ${session.sourceWindow.title}` : ''
    this.write(this.c.bold(`Session ${session.id}${source}: "${preview(session.selection.text)}"`))
    this.write(this.c.dim('Ask about the selection, or /help'))
  }

  reportNothingSelected() {
    this.write(this.c.yellow(`Nothing selected. Select some text and press ${this.hotkey} again.`))
  }

  async handleLine(raw: string): Promise<void> {
    const line = raw.trim()
    if (!line) return

    if (line.startsWith('/')) {
      await this.runCommand(line.slice(1).toLowerCase())
      return
    }

    const session = this.session
    if (!session) {
      this.write(this.c.yellow(`No active session. Select some text and press ${this.hotkey}.`))
      return
    }
    if (!this.inputEnabled) {
      this.write(this.c.yellow('Still waiting for the previous answer.'))
      return
    }
    if (!session.submit(line)) {
      this.write(this.c.yellow('Message not sent.'))
    }
  }

  onTurnAppended(turn: ConversationTurn) {
    this.write(this.formatTurn(turn))
  }

  onTurnRemoved(sequence: number) {
    logger.debug(`Turn ${sequence} removed`)
  }

  onSuggestionAvailable(text: string) {
    this.suggestion = text
    this.write(`${this.c.magenta.bold('Suggested edit')} ${this.c.dim('(/paste to apply)')}`)
    this.write(this.c.magenta(text))
  }

  onSuggestionCleared() {
    this.suggestion = null
  }

  onInputEnabled(enabled: boolean) {
    this.inputEnabled = enabled
  }

  onUndoEnabled(enabled: boolean) {
    this.undoEnabled = enabled
  }

  onPasteResult(outcome: PasteOutcome) {
    if (outcome.ok) {
      this.write(this.c.green(outcome.action === 'pasted' ? 'Pasted into the source window.' : 'Restored the previous text.'))
      return
    }
    const label = outcome.action === 'pasted' ? 'Paste failed' : 'Undo failed'
    this.write(this.c.red(outcome.reason ? `${label}: ${outcome.reason}` : label))
  }

  private async runCommand(command: string): Promise<void> {
    if (command === 'help') {
      HELP_LINES.forEach(line => this.write(line))
      return
    }

    const session = this.session
    if (!session) {
      this.write(this.c.yellow('No active session.'))
      return
    }

    switch (command) {
      case 'paste':
        await session.paste()
        return
      case 'undo':
        if (!this.undoEnabled) {
          this.write(this.c.yellow('Nothing to undo.'))
          return
        }
        await session.undo()
        return
      case 'close':
        session.close()
        this.session = null
        this.write(this.c.dim('Session closed.'))
        return
      default:
        this.write(this.c.yellow(`Unknown command /${command}, try /help`))
    }
  }

  private formatTurn(turn: ConversationTurn): string {
    switch (turn.role) {
      case 'user':
        return `${this.c.cyan.bold('You')}: ${turn.text}`
      case 'assistant':
        return `${this.c.green.bold('Assistant')}: ${turn.text}`
      case 'status':
        return this.c.dim(turn.text)
      case 'error':
        return `${this.c.red.bold(turn.title ?? 'Error')}: ${this.c.red(turn.text)}`
    }
  }
}
