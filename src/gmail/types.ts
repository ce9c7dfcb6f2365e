export type Label = {
  id: string
  name: string
  type: 'system' | 'user'
}

export type MessageSummary = {
  id: string
  threadId: string
  from: string
  to: string
  subject: string
  date: string
  snippet: string
  labelIds: string[]
  unread: boolean
  /** Epoch milliseconds, as reported by Gmail */
  internalDate: number
}

export type AttachmentInfo = {
  attachmentId: string
  filename: string
  mimeType: string
  size: number
}

export type MessageContent = MessageSummary & {
  body: string
  attachments: AttachmentInfo[]
}

export type Thread = {
  id: string
  messages: MessageContent[]
}

export type MessageState = {
  id: string
  threadId: string
  labelIds: string[]
  unread: boolean
}

export type SentMessage = {
  id: string
  threadId: string
  labelIds: string[]
}

export type Draft = {
  id: string
  messageId: string
  threadId: string
}

export type LabelApplication = {
  messageId: string
  label: Label
  created: boolean
  labelIds: string[]
}

export type NewMessage = {
  to: string
  subject: string
  body: string
}
