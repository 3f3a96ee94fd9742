import {createServer, type Server as HttpServer, type IncomingMessage, type ServerResponse} from 'node:http'

import type {TokenizerCapabilities} from '../types.js'

import {TokenCalculator} from '../calculator/calculator.js'
import {CalculatorError, clientErrorMessage, ValidationError} from '../calculator/errors.js'
import {modelsByFamily} from '../calculator/models.js'
import {type AppLogger, createLogger} from '../utils/logger.js'
import {CalculateRequestSchema} from './schema.js'

export const MAX_BODY_BYTES = 8 * 1024 * 1024

const ROUTES: Record<string, readonly string[]> = {
  '/api/calculate': ['POST'],
  '/api/models': ['GET'],
  '/health': ['GET'],
}

export interface CalculatorServerOptions {
  allowedOrigins?: readonly string[]
  /** Passed to both calculators; defaults to tiktoken plus the Anthropic API when a key is set */
  capabilities?: TokenizerCapabilities
  logger?: AppLogger
}

class PayloadTooLargeError extends CalculatorError {
  constructor() {
    super('Request body too large', 'PAYLOAD_TOO_LARGE', 413)
    this.name = 'PayloadTooLargeError'
  }
}

/**
 * HTTP API over two shared calculators, one per markdown preprocessing mode.
 * The calculators are disposed when the server closes.
 */
export function createCalculatorHttpServer(options: CalculatorServerOptions = {}): HttpServer {
  const logger = options.logger ?? createLogger('token-calc:http')
  const allowedOrigins = new Set(options.allowedOrigins ?? [])
  const calculators = {
    markdown: new TokenCalculator({capabilities: options.capabilities, preprocessMarkdown: true}),
    plain: new TokenCalculator({capabilities: options.capabilities, preprocessMarkdown: false}),
  }

  const handler = (req: IncomingMessage, res: ServerResponse) => {
    applySecurityHeaders(res)
    handleRequest(req, res).catch((error: unknown) => {
      logger.error('Unexpected error', error)
      if (!res.headersSent) {
        sendJson(res, 500, {error: clientErrorMessage(error)})
      }
    })
  }

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname
    const method = req.method ?? 'GET'
    logger.debug(`${method} ${path}`)

    if (path.startsWith('/api/')) {
      applyCorsHeaders(req, res, allowedOrigins)
    }

    const methods = ROUTES[path]
    if (!methods) {
      sendJson(res, 404, {error: 'Endpoint not found'})
      return
    }

    if (method === 'OPTIONS' && path.startsWith('/api/')) {
      res.writeHead(204)
      res.end()
      return
    }

    if (!methods.includes(method)) {
      sendJson(res, 405, {error: 'Method not allowed'})
      return
    }

    switch (path) {
      case '/api/calculate': {
        await calculate(req, res)
        break
      }

      case '/api/models': {
        sendJson(res, 200, {models: modelsByFamily()})
        break
      }

      default: {
        sendJson(res, 200, {status: 'healthy'})
      }
    }
  }

  async function calculate(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      const body = parseBody(await readBody(req))
      const parsed = CalculateRequestSchema.safeParse(body)
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid request', parsed.error)
      }

      const {model, preprocess_markdown: preprocess, text} = parsed.data
      const calculator = preprocess ? calculators.markdown : calculators.plain
      sendJson(res, 200, await calculator.countDetailed(text, model))
    } catch (error) {
      if (error instanceof CalculatorError && error.statusCode < 500) {
        logger.warn(`Rejected calculation: ${error.message}`)
        sendJson(res, error.statusCode, {error: error.message})
        return
      }

      logger.error('Calculation failed', error)
      sendJson(res, 500, {error: clientErrorMessage(error)})
    }
  }

  const server = createServer(handler)
  server.on('close', () => {
    calculators.markdown.dispose()
    calculators.plain.dispose()
  })

  return server
}

function parseBody(raw: string): object {
  let data: unknown
  try {
    data = raw ? JSON.parse(raw) : undefined
  } catch (error) {
    throw new ValidationError('Invalid request: No JSON data provided', error)
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data) || Object.keys(data).length === 0) {
    throw new ValidationError('Invalid request: No JSON data provided')
  }

  return data
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let size = 0

    req.on('data', (chunk: Buffer) => {
      size += chunk.length
      if (size > MAX_BODY_BYTES) {
        req.removeAllListeners('data')
        req.resume()
        reject(new PayloadTooLargeError())
        return
      }

      chunks.push(chunk)
    })
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')))
    req.on('error', reject)
  })
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, {'Content-Type': 'application/json'})
  res.end(JSON.stringify(body))
}

function applyCorsHeaders(req: IncomingMessage, res: ServerResponse, allowedOrigins: ReadonlySet<string>): void {
  const {origin} = req.headers
  if (!origin || !allowedOrigins.has(origin)) return

  res.setHeader('Access-Control-Allow-Origin', origin)
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS')
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type')
  res.setHeader('Vary', 'Origin')
}

function applySecurityHeaders(res: ServerResponse): void {
  res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'")
  res.setHeader('X-Content-Type-Options', 'nosniff')
  res.setHeader('X-Frame-Options', 'DENY')
  res.setHeader('X-XSS-Protection', '0')
  res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin')
  res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains')
}
