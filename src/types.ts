export type BackendFamily = 'approximate' | 'exact'

export type ModelId =
  | 'claude-2'
  | 'claude-3-haiku'
  | 'claude-3-opus'
  | 'claude-3-sonnet'
  | 'gpt-3.5-turbo'
  | 'gpt-4'
  | 'gpt-4-turbo'
  | 'text-embedding-ada-002'

export interface CalculationResult {
  character_count: number
  /** Only present when the count came from the heuristic estimate */
  is_approximate?: true
  model: ModelId
  token_count: number
}

export type ModelsByFamily = Record<BackendFamily, ModelId[]>

/**
 * Synchronous subword encoder, as handed out by tiktoken.
 */
export interface Encoder {
  encode(text: string, allowedSpecial?: 'all' | string[], disallowedSpecial?: 'all' | string[]): ArrayLike<number>
  free(): void
}

export type EncoderProvider = (modelName: string) => Encoder

export interface CountTokensRequest {
  messages: Array<{content: string; role: 'user'}>
  model: string
}

export interface CountTokensResponse {
  input_tokens: number
}

export interface RemoteTokenCounter {
  countTokens(request: CountTokensRequest): Promise<CountTokensResponse>
}

/**
 * Returns undefined when no credential or client is available for the model.
 */
export type RemoteCounterProvider = (model: string) => RemoteTokenCounter | undefined

export interface TokenizerCapabilities {
  encoderFor?: EncoderProvider
  remoteCounter?: RemoteCounterProvider
}

export interface CalculatorOptions {
  capabilities?: TokenizerCapabilities
  preprocessMarkdown?: boolean
}

export interface InputSource {
  source: string
  text: string
}
