import {Command, Flags} from '@oclif/core'

import {CalculatorError} from '../../calculator/errors.js'
import {createCalculatorHttpServer} from '../../server/http.js'
import {resolveSettings, type Settings} from '../../utils/config.js'
import {createLogger} from '../../utils/logger.js'

export default class Serve extends Command {
  static description = 'Start the token calculation HTTP API'
  static examples = [
    `<%= config.bin %> <%= command.id %> --port 8080
Serve GET /health, POST /api/calculate and GET /api/models on port 8080
`,
  ]
  static flags = {
    host: Flags.string({
      default: '127.0.0.1',
      description: 'Interface to bind',
    }),
    port: Flags.integer({
      char: 'p',
      description: 'Port to listen on; defaults to $PORT or the configured port',
      max: 65_535,
      min: 0,
    }),
  }

  async run(): Promise<void> {
    const {flags} = await this.parse(Serve)
    let settings: Settings
    try {
      settings = resolveSettings()
    } catch (error) {
      if (error instanceof CalculatorError) {
        this.error(error.message, {exit: 1})
      }

      throw error
    }

    const logger = createLogger('token-calc:http', {level: settings.logLevel})
    const port = flags.port ?? settings.port

    const server = createCalculatorHttpServer({allowedOrigins: settings.allowedOrigins, logger})

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, flags.host, () => resolve())
    })

    const address = server.address()
    const boundPort = address && typeof address === 'object' ? address.port : port
    logger.info(`token-calc API listening on http://${flags.host}:${boundPort}`)
    logger.info('Endpoints: GET /health, POST /api/calculate, GET /api/models')

    await new Promise<void>((resolve, reject) => {
      const stop = () => {
        logger.info('Shutting down')
        server.close((error) => (error ? reject(error) : resolve()))
      }

      process.once('SIGINT', stop)
      process.once('SIGTERM', stop)
    })
  }
}
