// src/main/core/conversation/errors.ts

export type ProviderErrorKind = 'auth' | 'connection' | 'empty-response' | 'other'

interface ErrorCategory {
  title: string
  message: string
}

const CATEGORIES: Record<ProviderErrorKind, ErrorCategory> = {
  auth: {
    title: 'API Key Error',
    message: 'Your API key appears to be invalid or has expired. Please check your API key in the settings.',
  },
  connection: {
    title: 'Connection Error',
    message: 'Unable to connect to the language model service. Please check your internet connection.',
  },
  'empty-response': {
    title: 'No Response',
    message: 'No response received from the language model service. The service might be experiencing high load.',
  },
  other: {
    title: 'Error',
    message: 'Please try again in a moment.',
  },
}

/**
 * A failed model round trip, already put into a category the user can act on.
 */
export class ProviderError extends Error {
  constructor(
    readonly kind: ProviderErrorKind,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options)
    this.name = 'ProviderError'
  }

  get title(): string {
    return CATEGORIES[this.kind].title
  }

  /** Text for the error turn. Unclassified errors keep their own message. */
  get userMessage(): string {
    if (this.kind === 'other') {
      return `${this.message}\n\n${CATEGORIES.other.message}`
    }
    return CATEGORIES[this.kind].message
  }
}

const KEY_TERMS: ReadonlyArray<[ProviderErrorKind, RegExp]> = [
  ['auth', /api key|authentication|unauthorized|auth/],
  ['connection', /timeout|connection|network/],
  ['empty-response', /no response/],
]

export function classifyProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error

  const message = error instanceof Error ? error.message : String(error)
  const text = message.toLowerCase()
  const kind = KEY_TERMS.find(([, pattern]) => pattern.test(text))?.[0] ?? 'other'

  return new ProviderError(kind, message, { cause: error })
}
