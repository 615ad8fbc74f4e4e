// tests/core/conversation/groq-provider.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ProviderError } from '../../../src/main/core/conversation/errors'
import { GroqConversationProvider, GROQ_CHAT_COMPLETIONS_URL } from '../../../src/main/core/conversation/groq-provider'
import { NetworkError } from '../../../src/main/utils/network'

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: 'assistant', content } }] }), { status: 200 })
}

describe('GroqConversationProvider', () => {
  const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
  let provider: GroqConversationProvider

  function requestBody(call: number) {
    const init = fetchMock.mock.calls[call][1]
    return JSON.parse(String(init?.body))
  }

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
    provider = new GroqConversationProvider({
      apiKey: 'test-secret',
      modelName: 'test-model',
      systemPrompt: 'Be brief.',
      temperature: 0.3,
      retry: { maxRetries: 1, retryDelay: 0, timeout: 1000 },
    })
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts the conversation and returns the reply', async () => {
    fetchMock.mockResolvedValueOnce(completion('Hi there'))

    await expect(provider.respond('Hello')).resolves.toBe('Hi there')

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe(GROQ_CHAT_COMPLETIONS_URL)
    expect(init?.method).toBe('POST')
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret')
    expect(requestBody(0)).toEqual({
      model: 'test-model',
      temperature: 0.3,
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hello' },
      ],
    })
  })

  it('sends earlier exchanges with follow-up prompts', async () => {
    fetchMock.mockResolvedValueOnce(completion('First answer'))
    fetchMock.mockResolvedValueOnce(completion('Second answer'))

    await provider.respond('First question')
    await provider.respond('Second question')

    expect(requestBody(1).messages).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'First question' },
      { role: 'assistant', content: 'First answer' },
      { role: 'user', content: 'Second question' },
    ])
  })

  it('forgets earlier exchanges on reset', async () => {
    fetchMock.mockResolvedValueOnce(completion('First answer'))
    await provider.respond('First question')

    provider.reset()

    expect(provider.history).toEqual([])
  })

  it('records nothing when the request fails', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ error: { message: 'overloaded' } }), { status: 503 }))

    await expect(provider.respond('Hello')).rejects.toThrow('Model request failed (503): overloaded')
    expect(provider.history).toEqual([])
  })

  it('reports rejected credentials as an authentication error', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ error: { message: 'Invalid API Key' } }), { status: 401 }))

    const error = await provider.respond('Hello').catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ProviderError)
    expect(error).toMatchObject({ kind: 'auth', message: 'Authentication failed (401): Invalid API Key' })
  })

  it('treats a blank completion as no response', async () => {
    fetchMock.mockResolvedValueOnce(completion('   '))

    await expect(provider.respond('Hello')).rejects.toMatchObject({ kind: 'empty-response' })
    expect(provider.history).toEqual([])
  })

  it('treats a body without choices as no response', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ choices: [] }), { status: 200 }))

    await expect(provider.respond('Hello')).rejects.toMatchObject({ kind: 'empty-response' })
  })

  it('wraps transport failures', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'))

    await expect(provider.respond('Hello')).rejects.toBeInstanceOf(NetworkError)
  })
})
