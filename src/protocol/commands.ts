/**
 * Client Commands
 *
 * Zod schemas for every frame a client may send. Each command names the
 * topic it targets, since one connection may hold a session per topic,
 * and may carry a `client_ref` that is echoed on its error.
 */

import { z } from 'zod'
import { PRESENCE_STATUSES, type PresenceStatus } from '../types/index.js'
import { Errors, type RealtimeError } from '../errors/index.js'

export const MAX_CONTENT_LENGTH = 4000

const ClientRefSchema = z.union([z.string().max(128), z.number()])

const base = {
  topic: z.string().min(1).max(256),
  client_ref: ClientRefSchema.optional(),
}

const MessageIdSchema = z.string().min(1).max(128)

/** Forwarded to the store unchanged; whitespace-only content is rejected */
const ContentSchema = z
  .string()
  .max(MAX_CONTENT_LENGTH)
  .refine((value) => value.trim().length > 0, { message: 'must not be blank' })

const EmojiSchema = z.string().min(1).max(64)

const AttachmentSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  contentType: z.string().optional(),
  size: z.number().int().nonnegative().optional(),
  url: z.string().optional(),
})

const PresenceStatusSchema = z.custom<PresenceStatus>(
  (value) => typeof value === 'string' && PRESENCE_STATUSES.some((status) => status === value),
  { message: `must be one of ${PRESENCE_STATUSES.join(', ')}` }
)

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

export const JoinCommandSchema = z.object({ op: z.literal('join'), ...base })

export const LeaveCommandSchema = z.object({ op: z.literal('leave'), ...base })

export const SendMessageCommandSchema = z.object({
  op: z.literal('send_message'),
  ...base,
  content: ContentSchema,
  attachments: z.array(AttachmentSchema).max(20).default([]),
  thread_id: MessageIdSchema.optional(),
})

export const EditMessageCommandSchema = z.object({
  op: z.literal('edit_message'),
  ...base,
  message_id: MessageIdSchema,
  content: ContentSchema,
})

export const DeleteMessageCommandSchema = z.object({
  op: z.literal('delete_message'),
  ...base,
  message_id: MessageIdSchema,
})

export const AddReactionCommandSchema = z.object({
  op: z.literal('add_reaction'),
  ...base,
  message_id: MessageIdSchema,
  emoji: EmojiSchema,
})

export const RemoveReactionCommandSchema = z.object({
  op: z.literal('remove_reaction'),
  ...base,
  message_id: MessageIdSchema,
  emoji: EmojiSchema,
})

export const TypingStartCommandSchema = z.object({ op: z.literal('typing_start'), ...base })

export const TypingStopCommandSchema = z.object({ op: z.literal('typing_stop'), ...base })

export const MarkReadCommandSchema = z.object({
  op: z.literal('mark_read'),
  ...base,
  message_id: MessageIdSchema,
})

export const LoadOlderMessagesCommandSchema = z.object({
  op: z.literal('load_older_messages'),
  ...base,
  before_id: MessageIdSchema,
})

export const StartThreadCommandSchema = z.object({
  op: z.literal('start_thread'),
  ...base,
  message_id: MessageIdSchema,
})

export const UpdateStatusCommandSchema = z.object({
  op: z.literal('update_status'),
  ...base,
  status: PresenceStatusSchema,
})

export const ClientCommandSchema = z.discriminatedUnion('op', [
  JoinCommandSchema,
  LeaveCommandSchema,
  SendMessageCommandSchema,
  EditMessageCommandSchema,
  DeleteMessageCommandSchema,
  AddReactionCommandSchema,
  RemoveReactionCommandSchema,
  TypingStartCommandSchema,
  TypingStopCommandSchema,
  MarkReadCommandSchema,
  LoadOlderMessagesCommandSchema,
  StartThreadCommandSchema,
  UpdateStatusCommandSchema,
])

export type ClientCommand = z.infer<typeof ClientCommandSchema>
export type CommandOp = ClientCommand['op']
export type ClientRef = z.infer<typeof ClientRefSchema>

/** A command narrowed by its op */
export type CommandOf<Op extends CommandOp> = Extract<ClientCommand, { op: Op }>

export const COMMAND_OPS: readonly CommandOp[] = ClientCommandSchema.options.map(
  (schema) => schema.shape.op.value
)

function isCommandOp(value: unknown): value is CommandOp {
  return typeof value === 'string' && COMMAND_OPS.some((op) => op === value)
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

export type ParsedCommand =
  | { ok: true; command: ClientCommand }
  | {
      ok: false
      /** The command's op when recognizable, else 'unknown' */
      op: CommandOp | 'unknown'
      /** The command's topic when readable */
      topic: string | null
      clientRef?: ClientRef
      error: RealtimeError
    }

function readField(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined
  return Object.getOwnPropertyDescriptor(value, key)?.value
}

/**
 * Decode and validate one client frame
 *
 * @example
 * ```typescript
 * const parsed = parseCommand('{"op":"typing_start","topic":"channel:general"}')
 * if (parsed.ok) route(parsed.command)
 * ```
 */
export function parseCommand(raw: string): ParsedCommand {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    return { ok: false, op: 'unknown', topic: null, error: Errors.invalid('frame', 'not valid JSON') }
  }

  const result = ClientCommandSchema.safeParse(data)
  if (result.success) {
    return { ok: true, command: result.data }
  }

  const op = readField(data, 'op')
  const topic = readField(data, 'topic')
  const clientRef = ClientRefSchema.safeParse(readField(data, 'client_ref'))
  const issue = result.error.issues[0]
  const field = issue ? issue.path.map(String).join('.') || 'root' : 'root'

  return {
    ok: false,
    op: isCommandOp(op) ? op : 'unknown',
    topic: typeof topic === 'string' ? topic : null,
    ...(clientRef.success && { clientRef: clientRef.data }),
    error: Errors.invalid(field, issue?.message ?? 'invalid command'),
  }
}
