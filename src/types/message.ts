/**
 * Message Types
 *
 * Shapes owned by the MessageStore. The real-time layer relays them
 * without interpreting their content.
 */

export interface Attachment {
  id: string
  name: string
  contentType?: string
  size?: number
  url?: string
}

export interface Reaction {
  emoji: string
  userId: string
}

export interface Message {
  id: string
  /** Topic name the message belongs to */
  topic: string
  authorId: string
  content: string
  attachments: Attachment[]
  /** Parent message id for thread replies */
  threadId: string | null
  reactions: Reaction[]
  /** ms since epoch */
  createdAt: number
  editedAt: number | null
}

export interface Thread {
  message: Message
  replies: Message[]
}
