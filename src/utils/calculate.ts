import type {TokenCalculator} from '../calculator/calculator.js'
import type {InputSource} from '../types.js'

import {formatResult} from './formatting.js'

export interface CountRequest {
  detailed: boolean
  input: InputSource
  model: string
}

/**
 * Output of `tokcalc count`: the bare number, or the detailed block.
 */
export async function renderCount(request: CountRequest, calculator: TokenCalculator): Promise<string> {
  if (request.detailed) {
    const result = await calculator.countDetailed(request.input.text, request.model)
    return formatResult(result, request.input.source)
  }

  const count = await calculator.count(request.input.text, request.model)
  return String(count)
}
