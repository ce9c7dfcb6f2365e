import type {
  Draft,
  Label,
  LabelApplication,
  MessageContent,
  MessageState,
  MessageSummary,
  SentMessage,
  Thread
} from "./gmail/index.js"

const SEPARATOR = '---'

export const formatLabels = (labels: Label[]) => {
  if (!labels.length) return 'No labels found.'
  return ['Gmail Labels:', ...labels.map(label => `- ${label.name} (ID: ${label.id})`)].join('\n')
}

const formatSummary = (message: MessageSummary) => [
  `ID: ${message.id}`,
  `From: ${message.from}`,
  `Subject: ${message.subject}`,
  `Date: ${message.date}`,
  `Snippet: ${message.snippet}`
].join('\n')

const formatSummaries = (heading: string, messages: MessageSummary[]) =>
  [heading, '', messages.map(formatSummary).join(`\n${SEPARATOR}\n`)].join('\n')

export const formatInbox = (messages: MessageSummary[], requested: number) => {
  if (!messages.length) return 'No messages found in inbox.'
  return formatSummaries(`Recent Inbox Messages (showing ${messages.length} of ${requested} requested):`, messages)
}

export const formatSearchResults = (query: string, messages: MessageSummary[]) => {
  if (!messages.length) return `No messages found matching query: '${query}'`
  return formatSummaries(`Search Results for '${query}' (${messages.length} found):`, messages)
}

export const formatMessage = (message: MessageContent) => {
  const lines = [
    `From: ${message.from}`,
    `To: ${message.to}`,
    `Subject: ${message.subject}`,
    `Date: ${message.date}`,
    '',
    'Content:',
    message.body
  ]
  if (message.attachments.length) {
    lines.push('', 'Attachments:', ...message.attachments.map(a => `- ${a.filename} (${a.mimeType}, ${a.size} bytes)`))
  }
  return lines.join('\n')
}

export const formatThread = (thread: Thread) => {
  const total = thread.messages.length
  const blocks = thread.messages.map((message, index) =>
    [`${SEPARATOR} Message ${index + 1} of ${total} ${SEPARATOR}`, formatMessage(message)].join('\n'))
  return [`Thread ${thread.id} (${total} messages):`, '', ...blocks].join('\n')
}

export const formatSent = (to: string, sent: SentMessage) =>
  `Email sent successfully to ${to}. Message ID: ${sent.id}`

export const formatDraft = (draft: Draft) =>
  `Draft created successfully. Draft ID: ${draft.id}`

export const formatLabelApplication = (result: LabelApplication) => {
  const lines = [`Label '${result.label.name}' added to message ${result.messageId}`]
  if (result.created) lines.unshift(`Created new label: ${result.label.name}`)
  return lines.join('\n')
}

export const formatState = (state: MessageState, action: string) =>
  `Message ${state.id} ${action}`
