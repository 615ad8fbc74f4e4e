// src/main/core/conversation/prompts.ts

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful assistant that gives concise, clear and accurate answers about the text the user has selected.
When analyzing text, focus on the most relevant points and provide insightful observations.
If you are unsure about something, say so rather than making assumptions.

IMPORTANT: If your answer contains a modified, translated, summarized, corrected or otherwise altered version of the user's text:
1. Put the altered text only inside a JSON block.
2. Use exactly this structure: \`\`\`json {"enhanced_content": "Your altered text here"}\`\`\`
3. Keep any explanation of the changes outside the JSON block.

If you only answer a question about the text or comment on it without altering it, do not use the JSON format.`

export const SUGGESTION_INSTRUCTION = `If the user is requesting to enhance, modify, or transform the text in any way,
include a JSON block with the enhanced content in the following format:
\`\`\`json
{"enhanced_content": "The enhanced text goes here"}
\`\`\`
Only include this JSON block if the user explicitly asks for text enhancement, rewriting, etc.`

export function buildInitialPrompt(selectedText: string, userText: string): string {
  return `Selected text:
\`\`\`
${selectedText}
\`\`\`
User question: ${userText}

${SUGGESTION_INSTRUCTION}`
}

export function buildFollowUpPrompt(userText: string): string {
  return `${userText}

${SUGGESTION_INSTRUCTION}`
}
