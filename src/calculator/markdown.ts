/**
 * Ordered substitutions that turn markdown into the plain text a model sees.
 * Each rule runs once over the output of the previous one.
 */
const MARKDOWN_RULES: ReadonlyArray<[pattern: RegExp, replacement: string]> = [
  // ATX headers: drop the marker, keep the heading text
  [/^#{1,6}[\t ]+/gm, ''],
  // Bold before italic so `**` is not read as two italic markers
  [/\*\*(.+?)\*\*/g, '$1'],
  [/\*(.+?)\*/g, '$1'],
  // Inline code never spans backticks or lines, so fences survive until the next rule
  [/`([^\n`]+)`/g, '$1'],
  [/^```\w*\n/gm, ''],
  [/^```$/gm, ''],
  // Images first: the link rule would otherwise leave the `!` behind
  [/!\[([^\]]+)]\([^)]+\)/g, '$1'],
  [/\[([^\]]+)]\([^)]+\)/g, '$1'],
]

/**
 * Strips markdown syntax while keeping its content. Never throws; unmatched
 * delimiters are left as they are.
 */
export function normalizeMarkdown(text: string): string {
  if (!text) return ''

  let result = text
  for (const [pattern, replacement] of MARKDOWN_RULES) {
    result = result.replace(pattern, replacement)
  }

  return result
}
