// src/main/core/input/apple-script.ts
import type { Chord, ForeignWindow, KeyName, KeySender, WindowTracker } from '../../types'
import { createLogger } from '../../utils/logger'
import { runCommand } from './exec'

const logger = createLogger('AppleScript')

const KEY_DOWN_TARGETS: Record<KeyName, string> = {
  modifier: 'command',
  shift: 'shift',
  c: '"c"',
  v: '"v"',
  left: '(ASCII character 28)',
}

const CHORD_KEYS: Record<Chord, string> = {
  copy: 'c',
  paste: 'v',
}

const LEFT_ARROW_KEY_CODE = 123

function runAppleScript(script: string): Promise<string> {
  return runCommand('osascript', ['-e', script])
}

/**
 * Escapes a string for use inside an AppleScript string literal.
 */
export function sanitizeAppleScriptString(str: string): string {
  return str
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
}

export class AppleScriptKeySender implements KeySender {
  async sendChord(chord: Chord): Promise<void> {
    await runAppleScript(`tell application "System Events"
  keystroke "${CHORD_KEYS[chord]}" using command down
end tell`)
  }

  async keyDown(key: KeyName): Promise<void> {
    await runAppleScript(`tell application "System Events" to key down ${KEY_DOWN_TARGETS[key]}`)
  }

  async keyUp(key: KeyName): Promise<void> {
    await runAppleScript(`tell application "System Events" to key up ${KEY_DOWN_TARGETS[key]}`)
  }

  async selectBackward(count: number): Promise<void> {
    if (count <= 0) return
    await runAppleScript(`tell application "System Events"
  repeat ${Math.floor(count)} times
    key code ${LEFT_ARROW_KEY_CODE} using shift down
  end repeat
end tell`)
  }
}

/**
 * macOS exposes the frontmost application, not its window, so the handle
 * identifies an application by name.
 */
export class AppleScriptWindowTracker implements WindowTracker {
  async getActiveWindow(): Promise<ForeignWindow | null> {
    try {
      const appName = await runAppleScript(`tell application "System Events"
  set frontApp to name of first application process whose frontmost is true
  return frontApp
end tell`)
      if (!appName) return null

      logger.debug(`Captured focused app: ${appName}`)
      return {
        id: appName,
        title: appName,
        activate: async () => {
          await runAppleScript(`tell application "${sanitizeAppleScriptString(appName)}" to activate`)
        },
      }
    } catch (error) {
      logger.error('Failed to capture focused app', error)
      return null
    }
  }
}
