// src/main/core/input/powershell.ts
import type { Chord, ForeignWindow, KeyName, KeySender, WindowTracker } from '../../types'
import { createLogger } from '../../utils/logger'
import { runCommand } from './exec'

const logger = createLogger('PowerShell')

const VIRTUAL_KEYS: Record<KeyName, number> = {
  modifier: 0x11, // VK_CONTROL
  shift: 0x10,
  c: 0x43,
  v: 0x56,
  left: 0x25,
}

const CHORD_KEYS: Record<Chord, KeyName> = {
  copy: 'c',
  paste: 'v',
}

const KEYEVENTF_KEYUP = 0x2

const USER32 = `Add-Type -Namespace SelectionChat -Name User32 -MemberDefinition @'
[DllImport("user32.dll")] public static extern void keybd_event(byte bVk, byte bScan, uint dwFlags, UIntPtr dwExtraInfo);
[DllImport("user32.dll")] public static extern IntPtr GetForegroundWindow();
[DllImport("user32.dll", CharSet = CharSet.Unicode)] public static extern int GetWindowText(IntPtr hWnd, System.Text.StringBuilder text, int count);
[DllImport("user32.dll")] public static extern bool SetForegroundWindow(IntPtr hWnd);
'@`

function runPowerShell(body: string): Promise<string> {
  return runCommand('powershell.exe', [
    '-NoProfile',
    '-NonInteractive',
    '-ExecutionPolicy', 'Bypass',
    '-Command', `${USER32}\n${body}`,
  ])
}

function keyEvent(key: KeyName, up: boolean): string {
  return `[SelectionChat.User32]::keybd_event(${VIRTUAL_KEYS[key]}, 0, ${up ? KEYEVENTF_KEYUP : 0}, [UIntPtr]::Zero)`
}

export class PowerShellKeySender implements KeySender {
  async sendChord(chord: Chord): Promise<void> {
    const key = CHORD_KEYS[chord]
    await runPowerShell([
      keyEvent('modifier', false),
      keyEvent(key, false),
      keyEvent(key, true),
      keyEvent('modifier', true),
    ].join('\n'))
  }

  async keyDown(key: KeyName): Promise<void> {
    await runPowerShell(keyEvent(key, false))
  }

  async keyUp(key: KeyName): Promise<void> {
    await runPowerShell(keyEvent(key, true))
  }

  async selectBackward(count: number): Promise<void> {
    if (count <= 0) return
    await runPowerShell([
      keyEvent('shift', false),
      `for ($i = 0; $i -lt ${Math.floor(count)}; $i++) {`,
      `  ${keyEvent('left', false)}`,
      `  ${keyEvent('left', true)}`,
      '  Start-Sleep -Milliseconds 1',
      '}',
      keyEvent('shift', true),
    ].join('\n'))
  }
}

export class PowerShellWindowTracker implements WindowTracker {
  async getActiveWindow(): Promise<ForeignWindow | null> {
    try {
      const output = await runPowerShell([
        '$handle = [SelectionChat.User32]::GetForegroundWindow()',
        '$title = New-Object System.Text.StringBuilder 512',
        '[void][SelectionChat.User32]::GetWindowText($handle, $title, 512)',
        'Write-Output "$($handle.ToInt64())`t$($title.ToString())"',
      ].join('\n'))

      const [id = '', title = ''] = output.split('\t')
      if (!/^\d+$/.test(id) || id === '0') return null

      return {
        id,
        title: title || `window ${id}`,
        activate: async () => {
          await runPowerShell(`[void][SelectionChat.User32]::SetForegroundWindow([IntPtr]${id})`)
        },
      }
    } catch (error) {
      logger.error('Failed to read the foreground window', error)
      return null
    }
  }
}
