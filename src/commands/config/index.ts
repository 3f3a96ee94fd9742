import {Command, Flags} from '@oclif/core'

import {CalculatorError} from '../../calculator/errors.js'
import {getConfigPath, getConfigStore, resolveSettings, setDefaultModel} from '../../utils/config.js'
import {formatSettings} from '../../utils/formatting.js'

export default class Config extends Command {
  static description = 'Show or update persisted settings'
  static examples = [
    `<%= config.bin %> <%= command.id %>
Print the current settings and where they are stored
`,
    `<%= config.bin %> <%= command.id %> --default-model claude-3-haiku --no-preprocess
Count for claude-3-haiku without markdown stripping unless told otherwise
`,
  ]
  static flags = {
    'default-model': Flags.string({
      description: 'Model used when count is run without --model',
    }),
    port: Flags.integer({
      description: 'Port used by serve when neither --port nor $PORT is given',
      max: 65_535,
      min: 0,
    }),
    preprocess: Flags.boolean({
      allowNo: true,
      description: 'Strip markdown syntax before counting by default',
    }),
  }

  async run(): Promise<void> {
    const {flags} = await this.parse(Config)
    const store = getConfigStore()

    try {
      if (flags['default-model'] !== undefined) {
        setDefaultModel(flags['default-model'], store)
      }

      if (flags.preprocess !== undefined) store.set('preprocessMarkdown', flags.preprocess)
      if (flags.port !== undefined) store.set('port', flags.port)

      this.log(formatSettings({...resolveSettings(store)}))
      this.log(`\nConfig file: ${getConfigPath(store)}`)
    } catch (error) {
      if (error instanceof CalculatorError) {
        this.error(error.message, {exit: 1})
      }

      throw error
    }
  }
}
