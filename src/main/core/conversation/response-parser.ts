// src/main/core/conversation/response-parser.ts
import { createLogger } from '../../utils/logger'

const logger = createLogger('ResponseParser')

export const SUGGESTION_FIELD = 'enhanced_content'

export interface ParsedReply {
  displayText: string
  suggestion: string | null
}

/**
 * First ```json fence whose body mentions the suggestion field. The body never
 * runs past a closing fence. The line break right after the closing fence goes
 * with the block.
 */
const SUGGESTION_BLOCK = /```json\s*(\{(?:(?!```)[\s\S])*?"enhanced_content"\s*:(?:(?!```)[\s\S])*?\})\s*```[ \t]*(?:\r?\n)?/

function hasSuggestionField(value: unknown): value is { [SUGGESTION_FIELD]: string } {
  return typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    SUGGESTION_FIELD in value &&
    typeof value[SUGGESTION_FIELD] === 'string'
}

/**
 * Splits a model reply into the text to show and the suggested replacement,
 * if the reply carries one. Malformed payloads leave the reply untouched.
 */
export function parseResponse(reply: string): ParsedReply {
  const match = SUGGESTION_BLOCK.exec(reply)
  if (!match) {
    return { displayText: reply, suggestion: null }
  }

  let payload: unknown
  try {
    payload = JSON.parse(match[1])
  } catch (error) {
    logger.warn('Error extracting enhanced content:', error instanceof Error ? error.message : error)
    return { displayText: reply, suggestion: null }
  }

  if (!hasSuggestionField(payload)) {
    logger.warn(`Suggestion block has no string "${SUGGESTION_FIELD}" field, ignoring it`)
    return { displayText: reply, suggestion: null }
  }

  const suggestion = payload[SUGGESTION_FIELD]
  logger.info(`Enhanced content found in response: ${suggestion.length} characters`)

  const displayText = (reply.slice(0, match.index) + reply.slice(match.index + match[0].length))
    .replace(/\n{3,}/g, '\n\n')
    .trim()

  return { displayText, suggestion }
}
