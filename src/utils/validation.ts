// src/utils/validation.ts

export type ValidationResult =
  | { valid: true; sanitized: string }
  | { valid: false; error: string }

export interface TextInputOptions {
  maxLength?: number
  allowEmpty?: boolean
}

/**
 * Checks a chat message typed or pasted into the host. Line endings are
 * normalized to \n and surrounding whitespace is dropped before the length
 * check.
 */
export function validateTextInput(
  text: string | undefined | null,
  options: TextInputOptions = {}
): ValidationResult {
  const { maxLength = 10000, allowEmpty = true } = options

  if (text === undefined || text === null) {
    return allowEmpty ? { valid: true, sanitized: '' } : { valid: false, error: 'Input is required' }
  }

  const sanitized = text.replace(/\r\n?/g, '\n').trim()

  if (!sanitized && !allowEmpty) {
    return { valid: false, error: 'Input cannot be empty' }
  }

  if (sanitized.length > maxLength) {
    return { valid: false, error: `Input exceeds maximum length of ${maxLength} characters` }
  }

  return { valid: true, sanitized }
}
