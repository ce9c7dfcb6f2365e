export { callGmail, createGmailClient, type GmailApi, type GmailContext } from "./client.js"
export { createDraft } from "./drafts.js"
export { addLabelToMessage, findOrCreateLabel, listLabels } from "./labels.js"
export {
  archiveMessage,
  getInboxMessages,
  getMessage,
  markAsRead,
  markAsUnread,
  modifyMessageLabels,
  normalizeMessageId,
  searchMessages,
  sendEmail,
  trashMessage
} from "./messages.js"
export { constructRawMessage, getAttachments, getBodyText } from "./mime.js"
export { getThread } from "./threads.js"
export type * from "./types.js"
