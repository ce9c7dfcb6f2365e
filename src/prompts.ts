import type { GetPromptResult } from "@modelcontextprotocol/sdk/types.js"
import { z } from "zod"
import { GmailError } from "./errors.js"
import { normalizeMessageId } from "./gmail/index.js"
import { formatIssues } from "./registry.js"

export const composeEmailPrompt = (to: string, subject = "", topic = "") => {
  let prompt = `Please help me compose an email to ${to}.`
  if (subject) prompt += ` The subject is '${subject}'.`
  if (topic) prompt += ` I need to write about the following topic: ${topic}.`
  return prompt + "\n\nPlease format the email with a professional greeting, body, and signature."
}

export const summarizeEmailsPrompt = (searchQuery = "in:inbox") => [
  `Please help me summarize recent emails matching the search query: '${searchQuery}'.`,
  "",
  "First, use the search_emails_tool to find these emails, then:",
  "1. Group emails by sender or topic",
  "2. Identify key information and action items",
  "3. Provide a brief summary of each important conversation",
  "4. Note any emails that require urgent attention",
  "",
  "Please organize the summary in a clear, scannable format."
].join("\n")

export const generateReplyPrompt = (messageId: string) => [
  `Please help me draft a reply to the email with ID: ${normalizeMessageId(messageId)}.`,
  "",
  "First, retrieve the email with the get_message_content_tool, then:",
  "1. Draft a professional and appropriate response",
  "2. Address all questions or requests from the original email",
  "3. Maintain a similar tone to the original message",
  "4. Keep the response concise but complete",
  "",
  "Please format the reply so it can be sent with the send_email tool."
].join("\n")

export const organizeInboxPrompt = (suggestions = true) => {
  const lines = [
    "Please help me organize my Gmail inbox.",
    "",
    "First, retrieve my current labels and recent inbox messages, then:",
    "1. Analyze my email patterns",
    "2. Suggest actions for specific emails (archive, label, etc.)",
    "3. Help me process emails that need responses"
  ]
  if (suggestions) {
    lines.push(
      "4. Suggest a labeling system to better organize my emails",
      "5. Recommend filters that might help manage my incoming mail"
    )
  }
  return lines.join("\n")
}

export type PromptDefinition = {
  name: string
  description: string
  arguments: { name: string, description?: string, required: boolean }[]
  render: (args: Record<string, string> | undefined) => string
}

// Prompt arguments arrive as strings, so every field of a prompt schema is a string
type PromptField = z.ZodString | z.ZodOptional<z.ZodString>

const definePrompt = <Shape extends Record<string, PromptField>>(prompt: {
  name: string
  description: string
  schema: z.ZodObject<Shape>
  render: (args: z.infer<z.ZodObject<Shape>>) => string
}): PromptDefinition => ({
  name: prompt.name,
  description: prompt.description,
  arguments: Object.entries<PromptField>(prompt.schema.shape).map(([name, field]) => ({
    name,
    description: field.description,
    required: !field.isOptional()
  })),
  render: args => {
    const parsed = prompt.schema.safeParse(args ?? {})
    if (!parsed.success) throw new GmailError('Invalid', `Invalid arguments for prompt ${prompt.name}: ${formatIssues(parsed.error)}`)
    return prompt.render(parsed.data)
  }
})

export const PROMPTS: PromptDefinition[] = [
  definePrompt({
    name: "compose_email",
    description: "Compose a new email",
    schema: z.object({
      to: z.string().describe("Recipient email address"),
      subject: z.string().optional().describe("Email subject"),
      topic: z.string().optional().describe("What the email is about")
    }),
    render: ({ to, subject, topic }) => composeEmailPrompt(to, subject, topic)
  }),

  definePrompt({
    name: "summarize_emails",
    description: "Summarize emails matching a Gmail search query",
    schema: z.object({
      search_query: z.string().optional().describe("Gmail search query, defaults to in:inbox")
    }),
    render: ({ search_query }) => summarizeEmailsPrompt(search_query || undefined)
  }),

  definePrompt({
    name: "generate_reply",
    description: "Draft a reply to a specific email",
    schema: z.object({
      message_id: z.string().describe("The ID of the message to reply to")
    }),
    render: ({ message_id }) => generateReplyPrompt(message_id)
  }),

  definePrompt({
    name: "organize_inbox",
    description: "Get help organizing the inbox",
    schema: z.object({
      suggestions: z.string().optional().describe("\"false\" to skip labeling and filter suggestions")
    }),
    render: ({ suggestions }) => organizeInboxPrompt(suggestions !== "false")
  })
]

export const getPrompt = (prompts: PromptDefinition[], name: string, args: Record<string, string> | undefined): GetPromptResult => {
  const prompt = prompts.find(p => p.name === name)
  if (!prompt) throw new GmailError('NotSupported', `Unknown prompt: ${name}`)
  return {
    description: prompt.description,
    messages: [{ role: "user", content: { type: "text", text: prompt.render(args) } }]
  }
}
