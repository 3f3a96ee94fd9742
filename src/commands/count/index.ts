import {Command, Flags} from '@oclif/core'
import clipboardy from 'clipboardy'

import {TokenCalculator} from '../../calculator/calculator.js'
import {CalculatorError} from '../../calculator/errors.js'
import {supportedModels} from '../../calculator/models.js'
import {renderCount} from '../../utils/calculate.js'
import {countDefaults} from '../../utils/config.js'
import {readInput} from '../../utils/file-system.js'

export default class Count extends Command {
  static description = 'Count the tokens a text or file uses for a model'
  static examples = [
    `<%= config.bin %> <%= command.id %> --model gpt-4 --input "Hello, world!"
Count tokens for a literal string
`,
    `<%= config.bin %> <%= command.id %> -m claude-3-opus -i notes.md --detailed
Count tokens in a file and show character count and approximation flag
`,
    `<%= config.bin %> <%= command.id %> -m gpt-4 -i "# Title" --no-preprocess
Count the raw markdown without stripping its syntax
`,
  ]
  static flags = {
    copy: Flags.boolean({
      char: 'c',
      description: 'Copy the output to the clipboard',
    }),
    detailed: Flags.boolean({
      char: 'd',
      description: 'Show model, character count and whether the count is approximate',
    }),
    input: Flags.string({
      char: 'i',
      description: 'Text to tokenize, or path to a file containing text',
      required: true,
    }),
    model: Flags.string({
      char: 'm',
      description: `Model to count for (${supportedModels().join(', ')}); defaults to the configured model`,
    }),
    preprocess: Flags.boolean({
      allowNo: true,
      description: 'Strip markdown syntax before counting; defaults to the configured setting',
    }),
  }

  async run(): Promise<void> {
    const {flags} = await this.parse(Count)
    const settings = countDefaults()

    const calculator = new TokenCalculator({
      preprocessMarkdown: flags.preprocess ?? settings.preprocessMarkdown,
    })

    try {
      const output = await renderCount(
        {
          detailed: flags.detailed,
          input: readInput(flags.input),
          model: flags.model ?? settings.defaultModel,
        },
        calculator,
      )
      this.log(output)

      if (flags.copy) {
        await clipboardy.write(output)
        this.log('Result has been copied to clipboard.')
      }
    } catch (error) {
      if (error instanceof CalculatorError) {
        this.error(error.message, {exit: 1})
      }

      throw error
    } finally {
      calculator.dispose()
    }
  }
}
