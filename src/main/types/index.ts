// src/main/types/index.ts
import type { LogLevel } from '../utils/logger'

export interface CapturedSelection {
  readonly text: string
  /** Epoch milliseconds */
  readonly capturedAt: number
}

export type TurnRole = 'user' | 'assistant' | 'status' | 'error'

export interface ConversationTurn {
  readonly role: TurnRole
  readonly text: string
  /** Strictly increasing within a session; also identifies the turn. */
  readonly sequence: number
  /** Category title, set on error turns only. */
  readonly title?: string
}

export type PipelineState = 'idle' | 'awaiting-response'

export type PasteAction = 'pasted' | 'undone'

export interface PasteOutcome {
  action: PasteAction
  ok: boolean
  reason?: string
}

/**
 * Events the presentation layer receives. Every call happens on the consumer.
 */
export interface PresentationSurface {
  onTurnAppended(turn: ConversationTurn): void
  onTurnRemoved(sequence: number): void
  onSuggestionAvailable(text: string): void
  onSuggestionCleared(): void
  onInputEnabled(enabled: boolean): void
  onUndoEnabled(enabled: boolean): void
  onPasteResult(outcome: PasteOutcome): void
}

/**
 * Stateful per session: remembers earlier exchanges until reset().
 */
export interface ConversationProvider {
  respond(prompt: string): Promise<string>
  reset(): void
}

export interface ForeignWindow {
  readonly id: string
  readonly title: string
  activate(): Promise<void>
}

export interface WindowTracker {
  getActiveWindow(): Promise<ForeignWindow | null>
}

export type Chord = 'copy' | 'paste'

export type KeyName = 'modifier' | 'shift' | 'c' | 'v' | 'left'

/**
 * Simulated keyboard input. `modifier` is Command on macOS, Control elsewhere.
 */
export interface KeySender {
  sendChord(chord: Chord): Promise<void>
  keyDown(key: KeyName): Promise<void>
  keyUp(key: KeyName): Promise<void>
  /** Shift+Left, `count` times, in one burst. */
  selectBackward(count: number): Promise<void>
}

export interface AssistantConfig {
  apiKey: string
  hotkey: string
  modelName: string
  systemPrompt: string
  temperature: number
  logLevel: LogLevel
}
