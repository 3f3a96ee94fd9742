import {Command} from '@oclif/core'

import type {ModelsByFamily} from '../../types.js'

import {modelsByFamily} from '../../calculator/models.js'
import {formatModelListing} from '../../utils/formatting.js'

export default class Models extends Command {
  static description = 'List supported models grouped by tokenizer backend'
  static enableJsonFlag = true
  static examples = [
    `<%= config.bin %> <%= command.id %>
`,
    `<%= config.bin %> <%= command.id %> --json
Print the grouping as JSON, as served by GET /api/models
`,
  ]

  async run(): Promise<ModelsByFamily> {
    const models = modelsByFamily()
    this.log(formatModelListing(models))
    return models
  }
}
