import type {CalculationResult, ModelsByFamily} from '../types.js'

const FAMILY_LABELS: Record<keyof ModelsByFamily, string> = {
  approximate: 'Approximate (remote count or heuristic)',
  exact: 'Exact (local tokenizer)',
}

/**
 * Formats a detailed result as the lines printed by `count --detailed`.
 */
export function formatResult(result: CalculationResult, source: string): string {
  const lines = [
    `Input: ${source}`,
    `Model: ${result.model}`,
    `Tokens: ${result.token_count}`,
    `Characters: ${result.character_count}`,
  ]

  if (result.is_approximate) {
    lines.push('Approximate: yes (heuristic estimate)')
  }

  return lines.join('\n')
}

export function formatModelListing(models: ModelsByFamily): string {
  const sections: string[] = []
  for (const family of ['exact', 'approximate'] as const) {
    const entries = models[family].map((model) => `  - ${model}`)
    sections.push(`${FAMILY_LABELS[family]}:\n${entries.join('\n')}`)
  }

  return sections.join('\n\n')
}

export function formatSettings(settings: Record<string, unknown>): string {
  return Object.entries(settings)
    .map(([key, value]) => `${key}: ${Array.isArray(value) ? value.join(', ') : String(value)}`)
    .join('\n')
}
