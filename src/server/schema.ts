import {z} from 'zod'

import {characterCount} from '../calculator/heuristic.js'

export const MAX_TEXT_LENGTH = 1_000_000

// Field order matters: the first failing field decides the error message
export const CalculateRequestSchema = z.object({
  text: z
    .string({
      invalid_type_error: 'Invalid text field: must be a string',
      required_error: 'Missing required field: text',
    })
    .refine((text) => characterCount(text) <= MAX_TEXT_LENGTH, {
      message: 'Text too large. Maximum 1,000,000 characters.',
    }),
  model: z.string({
    invalid_type_error: 'Invalid model field: must be a string',
    required_error: 'Missing required field: model',
  }),
  preprocess_markdown: z
    .boolean({invalid_type_error: 'Invalid preprocess_markdown field: must be a boolean'})
    .default(true),
})

export type CalculateRequest = z.infer<typeof CalculateRequestSchema>
