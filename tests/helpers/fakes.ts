// tests/helpers/fakes.ts
import type {
  Chord,
  ConversationProvider,
  ConversationTurn,
  ForeignWindow,
  KeyName,
  KeySender,
  PasteOutcome,
  PresentationSurface,
  WindowTracker,
} from '../../src/main/types'
import type { ClipboardAccess } from '../../src/main/core/clipboard/system-clipboard'

export const noSleep = async (_ms: number): Promise<void> => { }

export class FakeClipboard implements ClipboardAccess {
  writes: string[] = []
  failReads = false
  failWrites = false

  constructor(public value = '') { }

  async readText(): Promise<string> {
    if (this.failReads) throw new Error('clipboard unavailable')
    return this.value
  }

  async writeText(text: string): Promise<void> {
    if (this.failWrites) throw new Error('clipboard is locked')
    this.writes.push(text)
    this.value = text
  }
}

type KeyHandler = (event: string) => void | Promise<void>

/**
 * Records every simulated keystroke as a short string, e.g. "chord:copy",
 * "down:modifier" or "select:5".
 */
export class RecordingKeySender implements KeySender {
  events: string[] = []
  failOn = new Set<string>()

  constructor(private readonly onEvent: KeyHandler = () => { }) { }

  sendChord(chord: Chord): Promise<void> {
    return this.record(`chord:${chord}`)
  }

  keyDown(key: KeyName): Promise<void> {
    return this.record(`down:${key}`)
  }

  keyUp(key: KeyName): Promise<void> {
    return this.record(`up:${key}`)
  }

  selectBackward(count: number): Promise<void> {
    return this.record(`select:${count}`)
  }

  private async record(event: string): Promise<void> {
    this.events.push(event)
    await this.onEvent(event)
    if (this.failOn.has(event)) throw new Error(`${event} failed`)
  }
}

export class FakeWindow implements ForeignWindow {
  activations = 0

  constructor(
    readonly id: string,
    readonly title: string,
    private readonly tracker?: FakeWindowTracker
  ) { }

  async activate(): Promise<void> {
    this.activations++
    if (this.tracker) this.tracker.active = this
  }
}

export class FakeWindowTracker implements WindowTracker {
  active: ForeignWindow | null = null

  async getActiveWindow(): Promise<ForeignWindow | null> {
    return this.active
  }
}

export type SurfaceEvent =
  | { type: 'turn'; turn: ConversationTurn }
  | { type: 'removed'; sequence: number }
  | { type: 'suggestion'; text: string }
  | { type: 'suggestion-cleared' }
  | { type: 'input'; enabled: boolean }
  | { type: 'undo'; enabled: boolean }
  | { type: 'paste'; outcome: PasteOutcome }

export class RecordingSurface implements PresentationSurface {
  events: SurfaceEvent[] = []
  turns: ConversationTurn[] = []

  onTurnAppended(turn: ConversationTurn) {
    this.events.push({ type: 'turn', turn })
    this.turns.push(turn)
  }

  onTurnRemoved(sequence: number) {
    this.events.push({ type: 'removed', sequence })
    this.turns = this.turns.filter(turn => turn.sequence !== sequence)
  }

  onSuggestionAvailable(text: string) {
    this.events.push({ type: 'suggestion', text })
  }

  onSuggestionCleared() {
    this.events.push({ type: 'suggestion-cleared' })
  }

  onInputEnabled(enabled: boolean) {
    this.events.push({ type: 'input', enabled })
  }

  onUndoEnabled(enabled: boolean) {
    this.events.push({ type: 'undo', enabled })
  }

  onPasteResult(outcome: PasteOutcome) {
    this.events.push({ type: 'paste', outcome })
  }

  last<T extends SurfaceEvent['type']>(type: T): Extract<SurfaceEvent, { type: T }> | undefined {
    const matches = this.events.filter((event): event is Extract<SurfaceEvent, { type: T }> => event.type === type)
    return matches[matches.length - 1]
  }
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: unknown) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => { }
  let reject: (error: unknown) => void = () => { }
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

type ScriptedReply = string | Error | Deferred<string>

/**
 * Answers prompts from a script, in order. Deferred entries stay pending
 * until the test settles them.
 */
export class ScriptedProvider implements ConversationProvider {
  prompts: string[] = []
  resets = 0

  constructor(private readonly script: ScriptedReply[] = []) { }

  enqueue(reply: ScriptedReply) {
    this.script.push(reply)
  }

  async respond(prompt: string): Promise<string> {
    this.prompts.push(prompt)
    const next = this.script.shift()
    if (next === undefined) throw new Error('no scripted reply left')
    if (next instanceof Error) throw next
    if (typeof next === 'string') return next
    return next.promise
  }

  reset() {
    this.resets++
  }
}
