import {existsSync, readFileSync, statSync} from 'node:fs'

import type {InputSource} from '../types.js'

/**
 * Treats `input` as a path when it names an existing file, otherwise as
 * literal text.
 */
export function readInput(input: string): InputSource {
  if (input && existsSync(input) && statSync(input).isFile()) {
    return {
      source: `file: ${input}`,
      text: readFileSync(input, 'utf8'),
    }
  }

  return {source: 'text', text: input}
}
