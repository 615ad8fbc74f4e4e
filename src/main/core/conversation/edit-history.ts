// src/main/core/conversation/edit-history.ts

/**
 * Undo stack of suggested edits. The bottom entry is the original selection
 * and is never removed; consecutive duplicates are never stored.
 */
export class EditHistory {
  private readonly entries: string[]

  constructor(original: string) {
    this.entries = [original]
  }

  /** Appends `edit` unless it equals the current top. */
  push(edit: string): boolean {
    if (edit === this.current()) return false
    this.entries.push(edit)
    return true
  }

  /** Drops the top entry (never the original) and returns the new top. */
  pop(): string {
    if (this.entries.length > 1) {
      this.entries.pop()
    }
    return this.current()
  }

  current(): string {
    return this.entries[this.entries.length - 1]
  }

  original(): string {
    return this.entries[0]
  }

  canUndo(): boolean {
    return this.entries.length > 1
  }

  get size(): number {
    return this.entries.length
  }

  toArray(): readonly string[] {
    return [...this.entries]
  }
}
