/**
 * Wire format of a Delta: an ordered list of
 * `{insert, attributes?}`, `{retain, attributes?}` and `{delete}` records.
 */

import { z } from 'zod'

const attributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

export const attributeMapSchema = z.record(attributeValueSchema)

const embedSchema = z
  .record(z.unknown())
  .refine(embed => Object.keys(embed).length === 1, {
    message: 'embed must have exactly one key'
  })

export const insertOpSchema = z
  .object({
    insert: z.union([z.string().min(1, 'insert must not be empty'), embedSchema]),
    attributes: attributeMapSchema.optional()
  })
  .strict()

export const retainOpSchema = z
  .object({
    retain: z.number().int().positive('retain must be a positive number'),
    attributes: attributeMapSchema.optional()
  })
  .strict()

export const deleteOpSchema = z
  .object({
    delete: z.number().int().positive('delete must be a positive number')
  })
  .strict()

export const operationSchema = z.union([insertOpSchema, retainOpSchema, deleteOpSchema])

export const opsSchema = z.array(operationSchema)

/**
 * Accepts the bare ops list or the `{ ops: [...] }` envelope
 */
export const deltaJSONSchema = z.union([
  opsSchema,
  z.object({ ops: opsSchema }).transform(envelope => envelope.ops)
])

/**
 * Render the first zod issue as `ops[2].retain: retain must be a positive number`
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) {
    return 'Invalid delta'
  }

  const path = issue.path
    .map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
    .join('')

  return path ? `${path}: ${issue.message}` : issue.message
}
