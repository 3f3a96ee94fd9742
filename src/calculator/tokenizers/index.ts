import type {BackendFamily, TokenizerCapabilities} from '../../types.js'

import {ApproximateTokenizer} from './approximate.js'
import {ExactTokenizer} from './exact.js'

export {ApproximateTokenizer} from './approximate.js'
export {ExactTokenizer} from './exact.js'

export type TokenizerBackend = ApproximateTokenizer | ExactTokenizer

export function createTokenizer(
  model: string,
  family: BackendFamily,
  capabilities: TokenizerCapabilities,
): TokenizerBackend {
  switch (family) {
    case 'approximate': {
      return new ApproximateTokenizer(model, capabilities.remoteCounter)
    }

    case 'exact': {
      return new ExactTokenizer(model, capabilities.encoderFor)
    }

    default: {
      const unknown: never = family
      throw new Error(`Unknown backend family: ${String(unknown)}`)
    }
  }
}
