import Anthropic from '@anthropic-ai/sdk'
import {get_encoding, type TiktokenEncoding} from 'tiktoken'

import type {Encoder, RemoteCounterProvider, RemoteTokenCounter, TokenizerCapabilities} from '../types.js'

import {getAnthropicApiKey} from '../utils/config.js'

const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base'

// Models and their encodings
const MODEL_ENCODINGS: Record<string, TiktokenEncoding> = {
  'gpt-3.5-turbo': 'cl100k_base',
  'gpt-4': 'cl100k_base',
  'gpt-4-turbo': 'cl100k_base',
  'gpt-4o': 'o200k_base',
  'gpt-4o-mini': 'o200k_base',
  'text-davinci-003': 'p50k_base',
  'text-embedding-3-large': 'cl100k_base',
  'text-embedding-3-small': 'cl100k_base',
  'text-embedding-ada-002': 'cl100k_base',
}

/**
 * tiktoken encoder for a model name; unknown names get cl100k_base.
 * The caller owns the encoder and must free() it.
 */
export function tiktokenEncoderFor(modelName: string): Encoder {
  const encoding = Object.hasOwn(MODEL_ENCODINGS, modelName) ? MODEL_ENCODINGS[modelName] : DEFAULT_ENCODING
  return get_encoding(encoding)
}

// Registry ids and the dated ids the Messages API accepts
const ANTHROPIC_MODEL_IDS: Record<string, string> = {
  'claude-2': 'claude-2.1',
  'claude-3-haiku': 'claude-3-haiku-20240307',
  'claude-3-opus': 'claude-3-opus-20240229',
  'claude-3-sonnet': 'claude-3-sonnet-20240229',
}

export function anthropicModelId(model: string): string {
  return Object.hasOwn(ANTHROPIC_MODEL_IDS, model) ? ANTHROPIC_MODEL_IDS[model] : model
}

/**
 * Remote counting through Anthropic's count_tokens endpoint. Without a key
 * every model gets undefined, which selects the heuristic.
 */
export function anthropicRemoteCounter(apiKey: string | undefined): RemoteCounterProvider {
  let client: Anthropic | undefined

  return () => {
    if (!apiKey) return undefined

    const anthropic = client ?? new Anthropic({apiKey})
    client = anthropic
    const counter: RemoteTokenCounter = {
      countTokens: async (request) =>
        anthropic.messages.countTokens({...request, model: anthropicModelId(request.model)}),
    }
    return counter
  }
}

export function defaultCapabilities(): TokenizerCapabilities {
  return {
    encoderFor: tiktokenEncoderFor,
    remoteCounter: anthropicRemoteCounter(getAnthropicApiKey()),
  }
}
