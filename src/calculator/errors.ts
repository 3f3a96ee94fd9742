export class CalculatorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly cause?: unknown,
  ) {
    super(message)
    this.name = 'CalculatorError'
  }
}

export class UnsupportedModelError extends CalculatorError {
  constructor(public readonly model: string, supported: readonly string[]) {
    super(`Unsupported model: ${model}. Use one of: ${supported.join(', ')}`, 'UNSUPPORTED_MODEL', 400)
    this.name = 'UnsupportedModelError'
  }
}

export class MissingDependencyError extends CalculatorError {
  constructor(public readonly dependency: string, model: string) {
    super(`${dependency} is required to tokenize for ${model} but is not available`, 'MISSING_DEPENDENCY', 500)
    this.name = 'MissingDependencyError'
  }
}

export class BackendUnavailableError extends CalculatorError {
  constructor(public readonly model: string, reason: string, cause?: unknown) {
    super(`Remote token counting failed for ${model}: ${reason}`, 'BACKEND_UNAVAILABLE', 500, cause)
    this.name = 'BackendUnavailableError'
  }
}

export class ValidationError extends CalculatorError {
  constructor(message: string, cause?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, cause)
    this.name = 'ValidationError'
  }
}

// "token" alone is not secret-like here; every message in this service mentions tokens
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /secret/i,
  /password/i,
  /credential/i,
  /(access|auth|bearer|refresh)[_-\s]?token/i,
  /sk-ant-/i,
]

/**
 * Message that can be shown to an HTTP client or terminal user.
 * Client errors keep their text; anything internal is replaced.
 */
export function clientErrorMessage(error: unknown): string {
  if (error instanceof CalculatorError && error.statusCode < 500) {
    return error.message
  }

  const message = error instanceof Error ? error.message : String(error)
  if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(message))) {
    return 'Internal server error. Please check server logs.'
  }

  return 'An error occurred while processing your request.'
}
