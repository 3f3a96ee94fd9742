import type {RemoteCounterProvider, RemoteTokenCounter} from '../../types.js'

import {BackendUnavailableError} from '../errors.js'
import {approximateTokenCount} from '../heuristic.js'

/**
 * Counts through a remote counting API when one is configured, otherwise
 * estimates from character and word counts. The choice is made once, here.
 */
export class ApproximateTokenizer {
  readonly family = 'approximate'
  private readonly remote: RemoteTokenCounter | undefined

  constructor(readonly model: string, remoteCounter: RemoteCounterProvider | undefined) {
    this.remote = remoteCounter?.(model)
  }

  async countTokens(text: string): Promise<number> {
    if (!this.remote) {
      return approximateTokenCount(text)
    }

    let response: unknown
    try {
      response = await this.remote.countTokens({
        messages: [{content: text, role: 'user'}],
        model: this.model,
      })
    } catch (error) {
      throw new BackendUnavailableError(this.model, error instanceof Error ? error.name : 'request failed', error)
    }

    return readInputTokens(this.model, response)
  }

  dispose(): void {
    // nothing held locally
  }

  /**
   * Placeholder ids; only their number carries meaning.
   */
  async encode(text: string): Promise<number[]> {
    const count = await this.countTokens(text)
    return Array.from({length: count}, (_, index) => index)
  }

  isApproximating(): boolean {
    return this.remote === undefined
  }
}

function readInputTokens(model: string, response: unknown): number {
  if (typeof response === 'object' && response !== null && 'input_tokens' in response) {
    const tokens = response.input_tokens
    if (typeof tokens === 'number' && Number.isInteger(tokens) && tokens >= 0) {
      return tokens
    }
  }

  throw new BackendUnavailableError(model, 'malformed response')
}
