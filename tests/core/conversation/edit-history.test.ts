// tests/core/conversation/edit-history.test.ts
import { describe, expect, it } from 'vitest'
import { EditHistory } from '../../../src/main/core/conversation/edit-history'

describe('EditHistory', () => {
  it('starts with the original selection', () => {
    const history = new EditHistory('hello world')

    expect(history.current()).toBe('hello world')
    expect(history.original()).toBe('hello world')
    expect(history.canUndo()).toBe(false)
    expect(history.size).toBe(1)
  })

  it('does not store an edit equal to the top', () => {
    const history = new EditHistory('a')

    expect(history.push('a')).toBe(false)
    expect(history.push('b')).toBe(true)
    expect(history.push('b')).toBe(false)
    expect(history.push('a')).toBe(true)
    expect(history.toArray()).toEqual(['a', 'b', 'a'])
  })

  it('never pops the original', () => {
    const history = new EditHistory('a')
    history.push('b')

    expect(history.pop()).toBe('a')
    expect(history.pop()).toBe('a')
    expect(history.size).toBe(1)
    expect(history.canUndo()).toBe(false)
  })

  it('returns a copy from toArray', () => {
    const history = new EditHistory('a')
    const entries = history.toArray()
    history.push('b')
    expect(entries).toEqual(['a'])
  })
})
