export {TokenCalculator} from './calculator.js'
export {anthropicRemoteCounter, defaultCapabilities, tiktokenEncoderFor} from './capabilities.js'
export {
  BackendUnavailableError,
  CalculatorError,
  clientErrorMessage,
  MissingDependencyError,
  UnsupportedModelError,
  ValidationError,
} from './errors.js'
export {approximateTokenCount, characterCount} from './heuristic.js'
export {normalizeMarkdown} from './markdown.js'
export {backendFamilyOf, isSupported, modelsByFamily, supportedModels} from './models.js'
export {ApproximateTokenizer, createTokenizer, ExactTokenizer, type TokenizerBackend} from './tokenizers/index.js'
export type * from '../types.js'
