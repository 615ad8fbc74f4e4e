// tests/core/clipboard/clipboard-guard.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ClipboardGuard } from '../../../src/main/core/clipboard/clipboard-guard'
import { FakeClipboard } from '../../helpers/fakes'

describe('ClipboardGuard', () => {
  let clipboard: FakeClipboard
  let guard: ClipboardGuard

  beforeEach(() => {
    clipboard = new FakeClipboard('original')
    guard = new ClipboardGuard(clipboard)
  })

  describe('withClipboard', () => {
    it('restores the original content after the operation', async () => {
      const seen = await guard.withClipboard(async snapshot => {
        await guard.write('temporary')
        expect(clipboard.value).toBe('temporary')
        return snapshot.text
      })

      expect(seen).toBe('original')
      expect(clipboard.value).toBe('original')
    })

    it('restores the original content when the operation throws', async () => {
      await expect(guard.withClipboard(async () => {
        await guard.write('temporary')
        throw new Error('operation failed')
      })).rejects.toThrow('operation failed')

      expect(clipboard.value).toBe('original')
    })

    it('skips restoring when the clipboard was unreadable', async () => {
      clipboard.failReads = true

      await guard.withClipboard(async snapshot => {
        expect(snapshot.text).toBeNull()
        await guard.write('temporary')
      })

      expect(clipboard.value).toBe('temporary')
      expect(clipboard.writes).toEqual(['temporary'])
    })
  })

  it('serves acquisitions one at a time', async () => {
    const first = await guard.acquire()
    let secondAcquired = false
    const second = guard.acquire().then(snapshot => {
      secondAcquired = true
      return snapshot
    })

    await Promise.resolve()
    expect(secondAcquired).toBe(false)

    await guard.release(first)
    const next = await second
    expect(secondAcquired).toBe(true)
    expect(next.id).toBe(first.id + 1)
    await guard.release(next)
  })

  it('ignores the release of a snapshot that is not active', async () => {
    const snapshot = await guard.acquire()
    await guard.release(snapshot)
    clipboard.value = 'changed later'

    await guard.release(snapshot)
    expect(clipboard.value).toBe('changed later')
  })

  describe('releaseAfter', () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('restores the snapshot once the delay has passed', async () => {
      const snapshot = await guard.acquire()
      await guard.write('pasted')
      guard.releaseAfter(snapshot, 10_000)

      expect(guard.hasPendingRestore).toBe(true)
      await vi.advanceTimersByTimeAsync(9_999)
      expect(clipboard.value).toBe('pasted')

      await vi.advanceTimersByTimeAsync(1)
      const next = await guard.acquire()
      expect(next.text).toBe('original')
      expect(clipboard.value).toBe('original')
      expect(guard.hasPendingRestore).toBe(false)
      await guard.release(next)
    })

    it('keeps content the user copied in the meantime', async () => {
      const snapshot = await guard.acquire()
      await guard.write('pasted')
      guard.releaseAfter(snapshot, 10_000)

      clipboard.value = 'user copy'
      await vi.advanceTimersByTimeAsync(10_000)

      const next = await guard.acquire()
      expect(next.text).toBe('user copy')
      await guard.release(next)
      expect(clipboard.value).toBe('user copy')
    })

    it('runs a pending restore before the next acquisition reads', async () => {
      const snapshot = await guard.acquire()
      await guard.write('pasted')
      guard.releaseAfter(snapshot, 10_000)

      const next = await guard.acquire()
      expect(next.text).toBe('original')
      expect(guard.hasPendingRestore).toBe(false)
      await guard.release(next)
    })

    it('schedules nothing when the guard wrote nothing', async () => {
      const snapshot = await guard.acquire()
      guard.releaseAfter(snapshot, 10_000)
      expect(guard.hasPendingRestore).toBe(false)
    })

    it('can be flushed early', async () => {
      const snapshot = await guard.acquire()
      await guard.write('pasted')
      guard.releaseAfter(snapshot, 10_000)

      await guard.flushPendingRestore()
      expect(clipboard.value).toBe('original')
      expect(guard.hasPendingRestore).toBe(false)
    })
  })
})
