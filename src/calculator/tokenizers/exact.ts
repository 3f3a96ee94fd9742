import type {Encoder, EncoderProvider} from '../../types.js'

import {MissingDependencyError} from '../errors.js'

/**
 * Counts with a local subword encoder, so results are exact.
 */
export class ExactTokenizer {
  readonly family = 'exact'
  private readonly encoder: Encoder

  constructor(readonly model: string, encoderFor: EncoderProvider | undefined) {
    if (!encoderFor) {
      throw new MissingDependencyError('tiktoken', model)
    }

    this.encoder = encoderFor(model)
  }

  async countTokens(text: string): Promise<number> {
    return this.encode(text).length
  }

  dispose(): void {
    this.encoder.free() // release the wasm-backed encoding
  }

  // Special-token markers such as <|endoftext|> are counted as plain text
  encode(text: string): number[] {
    return Array.from(this.encoder.encode(text, [], []))
  }

  isApproximating(): boolean {
    return false
  }
}
