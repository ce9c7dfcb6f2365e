import { gmail_v1 } from 'googleapis'
import { GmailError } from "../errors.js"
import { callGmail, type GmailContext } from "./client.js"
import { constructRawMessage, findHeader, getAttachments, getBodyText } from "./mime.js"
import type { MessageContent, MessageState, MessageSummary, NewMessage, SentMessage } from "./types.js"

type Message = gmail_v1.Schema$Message

const METADATA_HEADERS = ['From', 'To', 'Subject', 'Date']

export const INBOX_MAX_RESULTS = 50
export const SEARCH_MAX_RESULTS = 100

const clamp = (value: number, max: number) => Math.min(Math.max(1, Math.floor(value)), max)

export const normalizeMessageId = (messageId: string) => {
  const id = messageId.trim()
  const normalized = id.startsWith('id_') ? id.slice(3) : id
  if (!normalized) throw new GmailError('Invalid', 'An id is required')
  return normalized
}

export const toMessageSummary = (message: Message): MessageSummary => {
  const headers = message.payload?.headers ?? []
  const labelIds = message.labelIds ?? []

  return {
    id: message.id ?? '',
    threadId: message.threadId ?? '',
    from: findHeader(headers, 'From') ?? '',
    to: findHeader(headers, 'To') ?? '',
    subject: findHeader(headers, 'Subject') ?? '',
    date: findHeader(headers, 'Date') ?? '',
    snippet: message.snippet ?? '',
    labelIds,
    unread: labelIds.includes('UNREAD'),
    internalDate: Number(message.internalDate ?? 0)
  }
}

export const toMessageContent = (message: Message): MessageContent => ({
  ...toMessageSummary(message),
  body: getBodyText(message.payload ?? undefined),
  attachments: getAttachments(message.payload ?? undefined)
})

const toMessageState = (message: Message): MessageState => {
  const labelIds = message.labelIds ?? []
  return {
    id: message.id ?? '',
    threadId: message.threadId ?? '',
    labelIds,
    unread: labelIds.includes('UNREAD')
  }
}

const listSummaries = async (
  ctx: GmailContext,
  operation: string,
  params: { labelIds?: string[], q?: string, maxResults: number }
): Promise<MessageSummary[]> => {
  const list = await callGmail(ctx, operation, gmail => gmail.users.messages.list({ userId: 'me', ...params }))

  const ids = (list.messages ?? []).flatMap(ref => ref.id ? [ref.id] : []).slice(0, params.maxResults)

  const summaries: MessageSummary[] = []
  for (const id of ids) {
    const message = await callGmail(ctx, `Get message ${id}`, gmail => gmail.users.messages.get({
      userId: 'me',
      id,
      format: 'metadata',
      metadataHeaders: METADATA_HEADERS
    }))
    summaries.push(toMessageSummary(message))
  }

  // Most recent first; Array.prototype.sort is stable for equal dates
  return summaries.sort((a, b) => b.internalDate - a.internalDate)
}

export const getInboxMessages = (ctx: GmailContext, maxResults = 10) =>
  listSummaries(ctx, 'List inbox messages', { labelIds: ['INBOX'], maxResults: clamp(maxResults, INBOX_MAX_RESULTS) })

/** The query is forwarded verbatim; Gmail's own search syntax applies. */
export const searchMessages = (ctx: GmailContext, query: string, maxResults = 10) =>
  listSummaries(ctx, 'Search messages', { q: query, maxResults: clamp(maxResults, SEARCH_MAX_RESULTS) })

export const getMessage = async (ctx: GmailContext, messageId: string): Promise<MessageContent> => {
  const id = normalizeMessageId(messageId)
  const data = await callGmail(ctx, `Get message ${id}`, gmail => gmail.users.messages.get({ userId: 'me', id, format: 'full' }))
  return toMessageContent(data)
}

export const sendEmail = async (ctx: GmailContext, params: NewMessage): Promise<SentMessage> => {
  const raw = constructRawMessage(params)
  const data = await callGmail(ctx, 'Send email', gmail => gmail.users.messages.send({ userId: 'me', requestBody: { raw } }), { retry: false })
  return {
    id: data.id ?? '',
    threadId: data.threadId ?? '',
    labelIds: data.labelIds ?? []
  }
}

export const modifyMessageLabels = async (
  ctx: GmailContext,
  messageId: string,
  changes: { add?: string[], remove?: string[] },
  operation = 'Modify message labels'
): Promise<MessageState> => {
  const id = normalizeMessageId(messageId)
  const data = await callGmail(ctx, `${operation} ${id}`, gmail => gmail.users.messages.modify({
    userId: 'me',
    id,
    requestBody: { addLabelIds: changes.add, removeLabelIds: changes.remove }
  }))
  return toMessageState(data)
}

export const markAsRead = (ctx: GmailContext, messageId: string) =>
  modifyMessageLabels(ctx, messageId, { remove: ['UNREAD'] }, 'Mark as read')

export const markAsUnread = (ctx: GmailContext, messageId: string) =>
  modifyMessageLabels(ctx, messageId, { add: ['UNREAD'] }, 'Mark as unread')

export const archiveMessage = (ctx: GmailContext, messageId: string) =>
  modifyMessageLabels(ctx, messageId, { remove: ['INBOX'] }, 'Archive message')

export const trashMessage = async (ctx: GmailContext, messageId: string): Promise<MessageState> => {
  const id = normalizeMessageId(messageId)
  const data = await callGmail(ctx, `Trash message ${id}`, gmail => gmail.users.messages.trash({ userId: 'me', id }))
  return toMessageState(data)
}
