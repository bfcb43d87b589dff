import path from 'node:path'
import { z } from 'zod'
import { SessionSettingsSchema } from '../lib/config'

export const AttachmentSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1)
    .max(255)
    .refine(
      (name) => path.basename(name) === name && name !== '.' && name !== '..',
      { message: 'Attachment name must be a plain file name' }
    ),
  contentBase64: z
    .string()
    .regex(/^[A-Za-z0-9+/]*={0,2}$/, {
      message: 'Attachment content must be base64 encoded',
    }),
})
export type Attachment = z.infer<typeof AttachmentSchema>

export const CreateSessionBodySchema = z
  .object({
    settings: SessionSettingsSchema.optional(),
  })
  .strict()

export const MessageBodySchema = z
  .object({
    query: z.string().trim().min(1, { message: 'Query must not be empty' }),
    attachment: AttachmentSchema.optional(),
  })
  .strict()

export const UpdateSettingsBodySchema = z
  .object({
    settings: SessionSettingsSchema,
  })
  .strict()

export class RequestValidationError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super('Invalid request')
    this.name = 'RequestValidationError'
  }
}

export function parseBody<Schema extends z.ZodTypeAny>(
  schema: Schema,
  body: unknown
): z.output<Schema> {
  const result = schema.safeParse(body ?? {})
  if (!result.success) {
    throw new RequestValidationError(result.error.issues)
  }
  return result.data
}

// Appended the same way a chat attachment is described to the model
export function withAttachmentPath(query: string, localPath: string): string {
  return `${query} local_path =${localPath}`
}
