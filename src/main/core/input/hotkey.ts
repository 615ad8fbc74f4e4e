// src/main/core/input/hotkey.ts
import type { UiohookKeyboardEvent } from 'uiohook-napi'
import { createLogger } from '../../utils/logger'

const logger = createLogger('Hotkey')

export const HOTKEY_DEBOUNCE_MS = 500

/**
 * Collapses bursts of triggers (key repeat, bouncing switches) into one
 * callback run per window. The window opens at the accepted trigger.
 */
export class HotkeyDebouncer {
  private locked = false
  private timer: NodeJS.Timeout | null = null
  private lastRun: Promise<void> = Promise.resolve()

  constructor(
    private readonly callback: () => void | Promise<void>,
    private readonly windowMs = HOTKEY_DEBOUNCE_MS
  ) { }

  trigger(): boolean {
    if (this.locked) {
      logger.debug('Hotkey trigger dropped inside debounce window')
      return false
    }

    this.locked = true
    this.timer = setTimeout(() => {
      this.locked = false
      this.timer = null
    }, this.windowMs)

    this.lastRun = this.invoke()
    return true
  }

  /** Resolves when the most recent accepted callback has finished. */
  settled(): Promise<void> {
    return this.lastRun
  }

  dispose() {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
    this.locked = false
  }

  private async invoke(): Promise<void> {
    try {
      await this.callback()
    } catch (error) {
      logger.error('Error in hotkey callback:', error)
    }
  }
}

export interface HotkeyCombination {
  keycode: number
  ctrl: boolean
  alt: boolean
  shift: boolean
  meta: boolean
}

type Modifier = 'ctrl' | 'alt' | 'shift' | 'meta'

const MODIFIER_ALIASES: Record<string, Modifier> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  alt: 'alt',
  option: 'alt',
  shift: 'shift',
  cmd: 'meta',
  command: 'meta',
  meta: 'meta',
  super: 'meta',
  win: 'meta',
}

const KEY_ALIASES: Record<string, string> = {
  esc: 'escape',
  return: 'enter',
  left: 'arrowleft',
  right: 'arrowright',
  up: 'arrowup',
  down: 'arrowdown',
}

/** Key name to keycode, e.g. uiohook-napi's UiohookKey. */
export type KeyTable = Readonly<Record<string, number>>

export class HotkeyParseError extends Error {
  constructor(spec: string, reason: string) {
    super(`Invalid hotkey "${spec}": ${reason}`)
    this.name = 'HotkeyParseError'
  }
}

/**
 * Parses "alt+shift+s" style combinations. Exactly one non-modifier key.
 */
export function parseHotkey(spec: string, keyTable: KeyTable): HotkeyCombination {
  const tokens = spec.split('+').map(token => token.trim().toLowerCase())
  if (tokens.some(token => !token)) {
    throw new HotkeyParseError(spec, 'empty key name')
  }

  const combination: HotkeyCombination = { keycode: -1, ctrl: false, alt: false, shift: false, meta: false }

  for (const token of tokens) {
    const modifier = MODIFIER_ALIASES[token]
    if (modifier) {
      if (combination[modifier]) {
        throw new HotkeyParseError(spec, `modifier "${token}" repeated`)
      }
      combination[modifier] = true
      continue
    }

    if (combination.keycode !== -1) {
      throw new HotkeyParseError(spec, 'more than one non-modifier key')
    }
    const keycode = lookupKey(KEY_ALIASES[token] ?? token, keyTable)
    if (keycode === undefined) {
      throw new HotkeyParseError(spec, `unknown key "${token}"`)
    }
    combination.keycode = keycode
  }

  if (combination.keycode === -1) {
    throw new HotkeyParseError(spec, 'no non-modifier key')
  }
  return combination
}

function lookupKey(name: string, keyTable: KeyTable): number | undefined {
  const entry = Object.entries(keyTable).find(([key]) => key.toLowerCase() === name)
  return entry?.[1]
}

export type KeyEventLike = Pick<UiohookKeyboardEvent, 'keycode' | 'ctrlKey' | 'altKey' | 'shiftKey' | 'metaKey'>

export function matchesHotkey(combination: HotkeyCombination, event: KeyEventLike): boolean {
  return event.keycode === combination.keycode &&
    event.ctrlKey === combination.ctrl &&
    event.altKey === combination.alt &&
    event.shiftKey === combination.shift &&
    event.metaKey === combination.meta
}

/**
 * System-wide keyboard hook. The native module is only loaded on start().
 */
export class GlobalHotkeyListener {
  private stopHook: (() => void) | null = null

  constructor(
    private readonly spec: string,
    private readonly debouncer: HotkeyDebouncer
  ) { }

  get isRunning(): boolean {
    return this.stopHook !== null
  }

  async start(): Promise<void> {
    if (this.stopHook) return

    const { uIOhook, UiohookKey } = await import('uiohook-napi')
    const combination = parseHotkey(this.spec, UiohookKey)

    const onKeyDown = (event: UiohookKeyboardEvent) => {
      if (matchesHotkey(combination, event)) {
        this.debouncer.trigger()
      }
    }

    uIOhook.on('keydown', onKeyDown)
    uIOhook.start()
    this.stopHook = () => {
      uIOhook.off('keydown', onKeyDown)
      uIOhook.stop()
    }
    logger.info(`Hotkey ${this.spec} registered`)
  }

  stop() {
    if (!this.stopHook) return
    this.stopHook()
    this.stopHook = null
    this.debouncer.dispose()
    logger.info('Hotkey listener stopped')
  }
}
