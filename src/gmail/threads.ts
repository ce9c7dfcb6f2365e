import { callGmail, type GmailContext } from "./client.js"
import { normalizeMessageId, toMessageContent } from "./messages.js"
import type { Thread } from "./types.js"

export const getThread = async (ctx: GmailContext, threadId: string): Promise<Thread> => {
  const id = normalizeMessageId(threadId)
  const data = await callGmail(ctx, `Get thread ${id}`, gmail => gmail.users.threads.get({ userId: 'me', id, format: 'full' }))
  return {
    id: data.id ?? id,
    messages: (data.messages ?? []).map(toMessageContent)
  }
}
