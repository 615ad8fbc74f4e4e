// tests/core/conversation/response-parser.test.ts
import { describe, expect, it } from 'vitest'
import { parseResponse } from '../../../src/main/core/conversation/response-parser'

describe('parseResponse', () => {
  it('splits the suggestion block from the surrounding text', () => {
    const reply = 'Here:\n```json\n{"enhanced_content": "X"}\n```\nDone.'

    expect(parseResponse(reply)).toEqual({ displayText: 'Here:\nDone.', suggestion: 'X' })
  })

  it('returns replies without a block unchanged', () => {
    const reply = 'The text is a greeting.'
    expect(parseResponse(reply)).toEqual({ displayText: reply, suggestion: null })
  })

  it('ignores json blocks without the suggestion field', () => {
    const reply = 'Data:\n```json\n{"other": 1}\n```'
    expect(parseResponse(reply)).toEqual({ displayText: reply, suggestion: null })
  })

  it('shows malformed blocks verbatim', () => {
    const reply = 'Try:\n```json\n{"enhanced_content": "unterminated}\n```'
    expect(parseResponse(reply)).toEqual({ displayText: reply, suggestion: null })
  })

  it('rejects a non-string suggestion', () => {
    const reply = '```json\n{"enhanced_content": 42}\n```'
    expect(parseResponse(reply)).toEqual({ displayText: reply, suggestion: null })
  })

  it('accepts a block on a single line and extra fields', () => {
    const reply = 'Fixed it. ```json {"enhanced_content": "Hello, world!", "note": "comma"}```'

    expect(parseResponse(reply)).toEqual({ displayText: 'Fixed it.', suggestion: 'Hello, world!' })
  })

  it('decodes escapes and keeps multi-line suggestions', () => {
    const reply = 'Rewritten:\n```json\n{"enhanced_content": "line one\\nline \\"two\\""}\n```\n\n\nHope that helps.'

    expect(parseResponse(reply)).toEqual({
      displayText: 'Rewritten:\n\nHope that helps.',
      suggestion: 'line one\nline "two"',
    })
  })

  it('uses the first suggestion block', () => {
    const reply = '```json\n{"enhanced_content": "first"}\n```\n```json\n{"enhanced_content": "second"}\n```'

    const parsed = parseResponse(reply)
    expect(parsed.suggestion).toBe('first')
    expect(parsed.displayText).toBe('```json\n{"enhanced_content": "second"}\n```')
  })

  it('skips an earlier json block without the suggestion field', () => {
    const reply = 'Input was:\n```json\n{"lang": "en"}\n```\nResult:\n```json\n{"enhanced_content": "bonjour"}\n```\nDone.'

    expect(parseResponse(reply)).toEqual({
      displayText: 'Input was:\n```json\n{"lang": "en"}\n```\nResult:\nDone.',
      suggestion: 'bonjour',
    })
  })
})
