// src/main/core/input/xdotool.ts
import type { Chord, ForeignWindow, KeyName, KeySender, WindowTracker } from '../../types'
import { createLogger } from '../../utils/logger'
import { runCommand } from './exec'

const logger = createLogger('Xdotool')

const KEYSYMS: Record<KeyName, string> = {
  modifier: 'ctrl',
  shift: 'shift',
  c: 'c',
  v: 'v',
  left: 'Left',
}

const CHORDS: Record<Chord, string> = {
  copy: 'ctrl+c',
  paste: 'ctrl+v',
}

/**
 * xdotool drives X11 only; Wayland sessions reject synthetic input.
 */
export function isWayland(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.XDG_SESSION_TYPE === 'wayland' || !!env.WAYLAND_DISPLAY
}

function xdotool(...args: string[]): Promise<string> {
  return runCommand('xdotool', args)
}

export class XdotoolKeySender implements KeySender {
  constructor() {
    if (isWayland()) {
      logger.warn('Wayland session detected, simulated keystrokes will probably be ignored')
    }
  }

  async sendChord(chord: Chord): Promise<void> {
    await xdotool('key', '--clearmodifiers', CHORDS[chord])
  }

  async keyDown(key: KeyName): Promise<void> {
    await xdotool('keydown', KEYSYMS[key])
  }

  async keyUp(key: KeyName): Promise<void> {
    await xdotool('keyup', KEYSYMS[key])
  }

  async selectBackward(count: number): Promise<void> {
    if (count <= 0) return
    await xdotool('key', '--repeat', String(Math.floor(count)), '--delay', '1', 'shift+Left')
  }
}

export class XdotoolWindowTracker implements WindowTracker {
  async getActiveWindow(): Promise<ForeignWindow | null> {
    try {
      const id = await xdotool('getactivewindow')
      if (!/^\d+$/.test(id)) return null

      const title = await xdotool('getwindowname', id).catch(error => {
        logger.debug(`No name for window ${id}`, error)
        return ''
      })
      return {
        id,
        title: title || `window ${id}`,
        activate: async () => {
          await xdotool('windowactivate', '--sync', id)
        },
      }
    } catch (error) {
      logger.error('Failed to read the active window', error)
      return null
    }
  }
}
