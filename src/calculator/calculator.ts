import type {CalculationResult, CalculatorOptions, ModelId, TokenizerCapabilities} from '../types.js'

import {defaultCapabilities} from './capabilities.js'
import {UnsupportedModelError} from './errors.js'
import {characterCount} from './heuristic.js'
import {normalizeMarkdown} from './markdown.js'
import {backendFamilyOf, isSupported, supportedModels} from './models.js'
import {createTokenizer, type TokenizerBackend} from './tokenizers/index.js'

/**
 * Entry point for token counting across models. Each instance owns its
 * tokenizer cache, so calculators with different settings stay independent.
 */
export class TokenCalculator {
  readonly preprocessMarkdown: boolean
  private readonly capabilities: TokenizerCapabilities
  private readonly tokenizers = new Map<ModelId, TokenizerBackend>()

  constructor(options: CalculatorOptions = {}) {
    this.preprocessMarkdown = options.preprocessMarkdown ?? true
    this.capabilities = options.capabilities ?? defaultCapabilities()
  }

  cachedModels(): ModelId[] {
    return [...this.tokenizers.keys()]
  }

  /**
   * Number of tokens `text` takes for `model`. Blank text is 0 without
   * touching a tokenizer.
   */
  async count(text: string, model: string): Promise<number> {
    const supported = this.validate(model)

    if (!text.trim()) return 0

    const processed = this.preprocessMarkdown ? normalizeMarkdown(text) : text
    return this.tokenizerFor(supported).countTokens(processed)
  }

  async countDetailed(text: string, model: string): Promise<CalculationResult> {
    const supported = this.validate(model)
    const tokenCount = await this.count(text, supported)
    const tokenizer = this.tokenizerFor(supported)

    const result: CalculationResult = {
      character_count: characterCount(text),
      model: supported,
      token_count: tokenCount,
    }

    if (tokenizer.isApproximating()) {
      result.is_approximate = true
    }

    return Object.freeze(result)
  }

  dispose(): void {
    for (const tokenizer of this.tokenizers.values()) {
      tokenizer.dispose()
    }

    this.tokenizers.clear()
  }

  hasTokenizer(model: string): boolean {
    return isSupported(model) && this.tokenizers.has(model)
  }

  // Construction is synchronous, so no two callers can miss the cache for the same model
  private tokenizerFor(model: ModelId): TokenizerBackend {
    const cached = this.tokenizers.get(model)
    if (cached) return cached

    const tokenizer = createTokenizer(model, backendFamilyOf(model), this.capabilities)
    this.tokenizers.set(model, tokenizer)
    return tokenizer
  }

  private validate(model: string): ModelId {
    if (!isSupported(model)) {
      throw new UnsupportedModelError(model, supportedModels())
    }

    return model
  }
}
