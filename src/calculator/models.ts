import type {BackendFamily, ModelId, ModelsByFamily} from '../types.js'

import {UnsupportedModelError} from './errors.js'

// Supported models and their tokenizer backends
const MODEL_FAMILIES: Record<ModelId, BackendFamily> = {
  'gpt-4': 'exact',
  'gpt-4-turbo': 'exact',
  'gpt-3.5-turbo': 'exact',
  'text-embedding-ada-002': 'exact',
  'claude-3-opus': 'approximate',
  'claude-3-sonnet': 'approximate',
  'claude-3-haiku': 'approximate',
  'claude-2': 'approximate',
}

export function isSupported(model: string): model is ModelId {
  return Object.hasOwn(MODEL_FAMILIES, model)
}

export function supportedModels(): ModelId[] {
  return Object.keys(MODEL_FAMILIES).filter(isSupported)
}

export function backendFamilyOf(model: string): BackendFamily {
  if (!isSupported(model)) {
    throw new UnsupportedModelError(model, supportedModels())
  }

  return MODEL_FAMILIES[model]
}

/**
 * Group the registry by backend family, keeping declaration order.
 */
export function modelsByFamily(): ModelsByFamily {
  const grouped: ModelsByFamily = {approximate: [], exact: []}
  for (const model of supportedModels()) {
    grouped[MODEL_FAMILIES[model]].push(model)
  }

  return grouped
}
