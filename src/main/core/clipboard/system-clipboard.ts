// src/main/core/clipboard/system-clipboard.ts
import clipboardy from 'clipboardy'

export interface ClipboardAccess {
  readText(): Promise<string>
  writeText(text: string): Promise<void>
}

/**
 * The OS clipboard, plain text only.
 */
export class SystemClipboard implements ClipboardAccess {
  async readText(): Promise<string> {
    return clipboardy.read()
  }

  async writeText(text: string): Promise<void> {
    await clipboardy.write(text)
  }
}
