// src/main/core/input/platform.ts
import type { KeySender, WindowTracker } from '../../types'
import { AppleScriptKeySender, AppleScriptWindowTracker } from './apple-script'
import { PowerShellKeySender, PowerShellWindowTracker } from './powershell'
import { XdotoolKeySender, XdotoolWindowTracker } from './xdotool'

export interface PlatformInput {
  keys: KeySender
  windows: WindowTracker
}

export class UnsupportedPlatformError extends Error {
  constructor(platform: string) {
    super(`Keystroke simulation is not supported on ${platform}`)
    this.name = 'UnsupportedPlatformError'
  }
}

export function createPlatformInput(platform: NodeJS.Platform = process.platform): PlatformInput {
  switch (platform) {
    case 'darwin':
      return { keys: new AppleScriptKeySender(), windows: new AppleScriptWindowTracker() }
    case 'win32':
      return { keys: new PowerShellKeySender(), windows: new PowerShellWindowTracker() }
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return { keys: new XdotoolKeySender(), windows: new XdotoolWindowTracker() }
    default:
      throw new UnsupportedPlatformError(platform)
  }
}
