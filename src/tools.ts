import { z } from "zod"
import {
  addLabelToMessage,
  archiveMessage,
  createDraft,
  getInboxMessages,
  getMessage,
  getThread,
  listLabels,
  markAsRead,
  markAsUnread,
  searchMessages,
  sendEmail,
  trashMessage
} from "./gmail/index.js"
import { defineTool, type ToolDefinition } from "./registry.js"

const messageId = z.string().trim().min(1).describe("The ID of the message")

const newMessage = z.object({
  to: z.string().trim().min(1).describe("Recipient email address"),
  subject: z.string().describe("The subject of the email"),
  body: z.string().describe("The plain text body of the email")
})

export const TOOLS: ToolDefinition[] = [
  defineTool({
    name: "get_labels_tool",
    description: "Get all Gmail labels (system and user-created) with their IDs",
    schema: z.object({}),
    run: ctx => listLabels(ctx)
  }),

  defineTool({
    name: "get_inbox_messages",
    description: "Get the most recent messages in the inbox, newest first. Returns summaries (sender, subject, date, snippet, labels, unread flag).",
    schema: z.object({
      max_results: z.number().int().positive().default(10).describe("Maximum number of messages to return (1-50)")
    }),
    run: (ctx, { max_results }) => getInboxMessages(ctx, max_results)
  }),

  defineTool({
    name: "get_message_content_tool",
    description: "Get the full content of a message by ID: headers, plain text body and attachment metadata",
    schema: z.object({ message_id: messageId }),
    run: (ctx, { message_id }) => getMessage(ctx, message_id)
  }),

  defineTool({
    name: "send_email",
    description: "Send a plain text email from the authenticated Gmail account",
    schema: newMessage,
    run: (ctx, params) => sendEmail(ctx, params)
  }),

  defineTool({
    name: "search_emails_tool",
    description: "Search messages with Gmail search syntax (e.g. from:alice@example.com is:unread). Returns summaries, newest first.",
    schema: z.object({
      query: z.string().describe("Gmail search query, forwarded as-is"),
      max_results: z.number().int().positive().default(10).describe("Maximum number of results to return (1-100)")
    }),
    run: (ctx, { query, max_results }) => searchMessages(ctx, query, max_results)
  }),

  defineTool({
    name: "create_draft",
    description: "Create a plain text draft email",
    schema: newMessage,
    run: (ctx, params) => createDraft(ctx, params)
  }),

  defineTool({
    name: "add_label_to_message",
    description: "Add a label to a message by label name, creating the label if it does not exist",
    schema: z.object({
      message_id: messageId,
      label_name: z.string().trim().min(1).describe("The display name of the label")
    }),
    run: (ctx, { message_id, label_name }) => addLabelToMessage(ctx, message_id, label_name)
  }),

  defineTool({
    name: "get_thread",
    description: "Get every message in a conversation thread, in order",
    schema: z.object({ thread_id: z.string().trim().min(1).describe("The ID of the thread") }),
    run: (ctx, { thread_id }) => getThread(ctx, thread_id)
  }),

  defineTool({
    name: "mark_as_read",
    description: "Mark a message as read (removes the UNREAD label)",
    schema: z.object({ message_id: messageId }),
    run: (ctx, { message_id }) => markAsRead(ctx, message_id)
  }),

  defineTool({
    name: "mark_as_unread",
    description: "Mark a message as unread (adds the UNREAD label)",
    schema: z.object({ message_id: messageId }),
    run: (ctx, { message_id }) => markAsUnread(ctx, message_id)
  }),

  defineTool({
    name: "archive_message",
    description: "Archive a message (removes the INBOX label)",
    schema: z.object({ message_id: messageId }),
    run: (ctx, { message_id }) => archiveMessage(ctx, message_id)
  }),

  defineTool({
    name: "trash_message",
    description: "Move a message to the trash",
    schema: z.object({ message_id: messageId }),
    run: (ctx, { message_id }) => trashMessage(ctx, message_id)
  })
]
