// Empirical ratios for Claude-family English text
const CHARS_PER_TOKEN = 3.7
const TOKENS_PER_WORD = 1.3

/**
 * Number of Unicode code points, so astral characters count once.
 */
export function characterCount(text: string): number {
  return [...text].length
}

export function wordCount(text: string): number {
  const trimmed = text.trim()
  return trimmed ? trimmed.split(/\s+/).length : 0
}

/**
 * Averages a character-based and a word-based estimate, rounding half up.
 * Non-empty text is always at least one token.
 */
export function approximateTokenCount(text: string): number {
  if (!text) return 0

  const charBased = characterCount(text) / CHARS_PER_TOKEN
  const wordBased = wordCount(text) * TOKENS_PER_WORD
  const estimate = Math.floor((charBased + wordBased) / 2 + 0.5)

  return Math.max(1, estimate)
}
