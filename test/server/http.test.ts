import type {Server} from 'node:http'

import {expect} from 'chai'
import sinon from 'sinon'

import type {TokenizerCapabilities} from '../../src/types.js'

import {tiktokenEncoderFor} from '../../src/calculator/capabilities.js'
import {createCalculatorHttpServer} from '../../src/server/http.js'
import {createLogger} from '../../src/utils/logger.js'

const ORIGIN = 'http://localhost:5000'

async function startServer(capabilities: TokenizerCapabilities): Promise<{baseUrl: string; server: Server}> {
  const server = createCalculatorHttpServer({
    allowedOrigins: [ORIGIN],
    capabilities,
    logger: createLogger('test', {level: 'fatal'}),
  })

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve())
  })

  const address = server.address()
  const port = address && typeof address === 'object' ? address.port : 0
  return {baseUrl: `http://127.0.0.1:${port}`, server}
}

async function stopServer(server: Server): Promise<void> {
  server.closeAllConnections()
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()))
  })
}

function post(baseUrl: string, body: string): Promise<Response> {
  return fetch(`${baseUrl}/api/calculate`, {
    body,
    headers: {'Content-Type': 'application/json'},
    method: 'POST',
  })
}

describe('calculator HTTP server', () => {
  let baseUrl: string
  let server: Server

  before(async () => {
    ;({baseUrl, server} = await startServer({encoderFor: tiktokenEncoderFor}))
  })

  after(async () => {
    await stopServer(server)
  })

  it('GET /health reports healthy', async () => {
    const res = await fetch(`${baseUrl}/health`)
    expect(res.status).to.equal(200)
    expect(await res.json()).to.deep.equal({status: 'healthy'})
  })

  it('GET /api/models groups models by family', async () => {
    const res = await fetch(`${baseUrl}/api/models`)
    expect(res.status).to.equal(200)
    expect(await res.json()).to.deep.equal({
      models: {
        approximate: ['claude-3-opus', 'claude-3-sonnet', 'claude-3-haiku', 'claude-2'],
        exact: ['gpt-4', 'gpt-4-turbo', 'gpt-3.5-turbo', 'text-embedding-ada-002'],
      },
    })
  })

  describe('POST /api/calculate', () => {
    it('returns the detailed result', async () => {
      const res = await post(baseUrl, JSON.stringify({model: 'gpt-4', text: 'Hello, world!'}))
      expect(res.status).to.equal(200)
      expect(await res.json()).to.deep.equal({character_count: 13, model: 'gpt-4', token_count: 4})
    })

    it('flags approximate counts', async () => {
      const res = await post(baseUrl, JSON.stringify({model: 'claude-3-opus', text: 'Hello'}))
      expect(await res.json()).to.deep.equal({
        character_count: 5,
        is_approximate: true,
        model: 'claude-3-opus',
        token_count: 1,
      })
    })

    it('honours preprocess_markdown', async () => {
      const text = '# **Bold Title**'
      const stripped = await post(baseUrl, JSON.stringify({model: 'gpt-4', text}))
      const raw = await post(baseUrl, JSON.stringify({model: 'gpt-4', preprocess_markdown: false, text}))

      const strippedBody: unknown = await stripped.json()
      const rawBody: unknown = await raw.json()
      expect(strippedBody).to.have.property('character_count', 16)
      expect(rawBody).to.have.property('character_count', 16)
      expect(strippedBody).to.not.deep.equal(rawBody)
    })

    it('rejects a body that is not JSON', async () => {
      const res = await post(baseUrl, 'not json')
      expect(res.status).to.equal(400)
      expect(await res.json()).to.deep.equal({error: 'Invalid request: No JSON data provided'})
    })

    it('rejects an empty object', async () => {
      const res = await post(baseUrl, '{}')
      expect(res.status).to.equal(400)
      expect(await res.json()).to.deep.equal({error: 'Invalid request: No JSON data provided'})
    })

    it('names the missing field', async () => {
      const noText = await post(baseUrl, JSON.stringify({model: 'gpt-4'}))
      expect(noText.status).to.equal(400)
      expect(await noText.json()).to.deep.equal({error: 'Missing required field: text'})

      const noModel = await post(baseUrl, JSON.stringify({text: 'Hello'}))
      expect(await noModel.json()).to.deep.equal({error: 'Missing required field: model'})
    })

    it('rejects fields of the wrong type', async () => {
      const res = await post(baseUrl, JSON.stringify({model: 'gpt-4', text: 42}))
      expect(res.status).to.equal(400)
      expect(await res.json()).to.deep.equal({error: 'Invalid text field: must be a string'})
    })

    it('rejects oversized text', async () => {
      const res = await post(baseUrl, JSON.stringify({model: 'gpt-4', text: 'a'.repeat(1_000_001)}))
      expect(res.status).to.equal(400)
      expect(await res.json()).to.deep.equal({error: 'Text too large. Maximum 1,000,000 characters.'})
    })

    it('counts text that quotes special-token markers', async () => {
      const res = await post(baseUrl, JSON.stringify({model: 'gpt-4', text: 'a <|endoftext|> b'}))
      expect(res.status).to.equal(200)
      const body = await res.json()
      expect(body).to.have.property('character_count', 17)
      expect(body).to.have.property('token_count').that.is.greaterThan(3)
    })

    it('accepts a million code points even when they take more UTF-16 units', async () => {
      const res = await post(baseUrl, JSON.stringify({model: 'claude-2', text: '\u{1F600}'.repeat(600_000)}))
      expect(res.status).to.equal(200)
      expect(await res.json()).to.have.property('character_count', 600_000)
    })

    it('rejects unsupported models', async () => {
      const res = await post(baseUrl, JSON.stringify({model: 'invalid-model', text: 'Hello'}))
      expect(res.status).to.equal(400)
      expect(await res.json()).to.deep.equal({
        error:
          'Unsupported model: invalid-model. Use one of: gpt-4, gpt-4-turbo, gpt-3.5-turbo, text-embedding-ada-002, claude-3-opus, claude-3-sonnet, claude-3-haiku, claude-2',
      })
    })
  })

  it('returns 404 for unknown paths', async () => {
    const res = await fetch(`${baseUrl}/unknown`)
    expect(res.status).to.equal(404)
    expect(await res.json()).to.deep.equal({error: 'Endpoint not found'})
  })

  it('returns 405 for the wrong method', async () => {
    const res = await fetch(`${baseUrl}/api/calculate`)
    expect(res.status).to.equal(405)
    expect(await res.json()).to.deep.equal({error: 'Method not allowed'})
  })

  it('answers CORS preflight for allowed origins', async () => {
    const res = await fetch(`${baseUrl}/api/calculate`, {headers: {Origin: ORIGIN}, method: 'OPTIONS'})
    expect(res.status).to.equal(204)
    expect(res.headers.get('access-control-allow-origin')).to.equal(ORIGIN)
    expect(res.headers.get('vary')).to.equal('Origin')
  })

  it('does not allow other origins', async () => {
    const res = await fetch(`${baseUrl}/api/models`, {headers: {Origin: 'http://evil.test'}})
    expect(res.status).to.equal(200)
    expect(res.headers.get('access-control-allow-origin')).to.be.null
  })

  it('applies security headers to every response', async () => {
    const res = await fetch(`${baseUrl}/health`)
    expect(res.headers.get('x-content-type-options')).to.equal('nosniff')
    expect(res.headers.get('x-frame-options')).to.equal('DENY')
    expect(res.headers.get('content-security-policy')).to.equal("default-src 'none'; frame-ancestors 'none'")
    expect(res.headers.get('strict-transport-security')).to.equal('max-age=31536000; includeSubDomains')
  })
})

describe('calculator HTTP server with a failing remote counter', () => {
  let baseUrl: string
  let server: Server
  let countTokens: sinon.SinonStub

  before(async () => {
    countTokens = sinon.stub().rejects(new Error('connect ECONNREFUSED 127.0.0.1:443'))
    ;({baseUrl, server} = await startServer({encoderFor: tiktokenEncoderFor, remoteCounter: () => ({countTokens})}))
  })

  after(async () => {
    await stopServer(server)
  })

  it('hides the failure behind a generic 500', async () => {
    const res = await post(baseUrl, JSON.stringify({model: 'claude-3-sonnet', text: 'Hello'}))
    expect(res.status).to.equal(500)
    expect(await res.json()).to.deep.equal({error: 'An error occurred while processing your request.'})
    expect(countTokens.calledOnce).to.be.true
  })
})
