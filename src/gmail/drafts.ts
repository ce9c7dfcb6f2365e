import { callGmail, type GmailContext } from "./client.js"
import { constructRawMessage } from "./mime.js"
import type { Draft, NewMessage } from "./types.js"

export const createDraft = async (ctx: GmailContext, params: NewMessage): Promise<Draft> => {
  const raw = constructRawMessage(params)
  const data = await callGmail(ctx, 'Create draft', gmail => gmail.users.drafts.create({
    userId: 'me',
    requestBody: { message: { raw } }
  }), { retry: false })

  return {
    id: data.id ?? '',
    messageId: data.message?.id ?? '',
    threadId: data.message?.threadId ?? ''
  }
}
