// src/main/core/conversation/groq-provider.ts
import type { ConversationProvider } from '../../types'
import { createLogger } from '../../utils/logger'
import { fetchWithRetry, type RetryOptions } from '../../utils/network'
import { ProviderError } from './errors'

const logger = createLogger('GroqProvider')

export const GROQ_CHAT_COMPLETIONS_URL = 'https://api.groq.com/openai/v1/chat/completions'

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface GroqProviderOptions {
  apiKey: string
  modelName: string
  systemPrompt: string
  temperature?: number
  endpoint?: string
  retry?: RetryOptions
}

const DEFAULT_RETRY: RetryOptions = { maxRetries: 2, retryDelay: 1000, timeout: 60_000 }

function extractContent(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('choices' in body) || !Array.isArray(body.choices)) {
    return null
  }
  const first: unknown = body.choices[0]
  if (typeof first !== 'object' || first === null || !('message' in first)) return null
  const message: unknown = first.message
  if (typeof message !== 'object' || message === null || !('content' in message)) return null
  return typeof message.content === 'string' ? message.content : null
}

function extractErrorMessage(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('error' in body)) return null
  const error: unknown = body.error
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  return null
}

/**
 * Chat completions against Groq's OpenAI-compatible endpoint. Keeps the
 * exchanges of one session as conversational memory.
 */
export class GroqConversationProvider implements ConversationProvider {
  private memory: ChatMessage[] = []
  private readonly temperature: number
  private readonly endpoint: string
  private readonly retry: RetryOptions

  constructor(private readonly options: GroqProviderOptions) {
    this.temperature = options.temperature ?? 0.7
    this.endpoint = options.endpoint ?? GROQ_CHAT_COMPLETIONS_URL
    this.retry = options.retry ?? DEFAULT_RETRY
    logger.info(`Initializing provider with model: ${options.modelName}`)
  }

  get history(): readonly ChatMessage[] {
    return this.memory
  }

  reset(): void {
    this.memory = []
  }

  async respond(prompt: string): Promise<string> {
    logger.info(`Invoking model with user input (${prompt.length} chars)`)

    const messages: ChatMessage[] = [
      { role: 'system', content: this.options.systemPrompt },
      ...this.memory,
      { role: 'user', content: prompt },
    ]

    const response = await fetchWithRetry(this.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify({
        model: this.options.modelName,
        messages,
        temperature: this.temperature,
      }),
    }, this.retry)

    const body: unknown = await response.json().catch(error => {
      logger.warn('Response body is not JSON', error)
      return null
    })

    if (!response.ok) {
      const detail = extractErrorMessage(body) ?? response.statusText
      if (response.status === 401 || response.status === 403) {
        throw new ProviderError('auth', `Authentication failed (${response.status}): ${detail}`)
      }
      throw new Error(`Model request failed (${response.status}): ${detail}`)
    }

    const reply = extractContent(body)
    if (!reply || !reply.trim()) {
      throw new ProviderError('empty-response', 'No response received from the language model service')
    }

    this.memory.push({ role: 'user', content: prompt }, { role: 'assistant', content: reply })
    logger.info(`Model response received (${reply.length} chars)`)
    return reply
  }
}
