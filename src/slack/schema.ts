import { z } from 'zod';
import { jsonObjectSchema } from './json.js';

// ─── Validation Schemas ────────────────────────────────────────────

export const fileUploadSchema = z.object({
  path: z.string().min(1),
  filename: z.string().optional(),
  altText: z.string().optional(),
  snippetType: z.string().optional(),
  initialComment: z.string().optional(),
  threadTs: z.string().optional(),
  title: z.string().optional(),
});

export const slackTaskSchema = z.object({
  token: z.string().min(1, 'token is required'),
  domain: z.string().optional(),
  msg: z.string().optional(),
  channel: z.string().optional(),
  threadId: z.string().optional(),
  messageId: z.string().optional(),
  username: z.string().optional(),
  iconUrl: z.string().optional(),
  iconEmoji: z.string().optional(),
  linkNames: z.union([z.literal(0), z.literal(1)]).default(1),
  parse: z.enum(['full', 'none']).optional(),
  validateCerts: z.boolean().default(true),
  color: z.string().default('normal'),
  attachments: z.array(jsonObjectSchema).optional(),
  blocks: z.array(jsonObjectSchema).optional(),
  prependHash: z.enum(['always', 'never', 'auto']).optional(),
  uploadFile: fileUploadSchema.optional(),
});

/** A task record as callers write it. */
export type SlackTaskInput = z.input<typeof slackTaskSchema>;

/** A task record with defaults applied. */
export type SlackTaskParams = z.output<typeof slackTaskSchema>;
