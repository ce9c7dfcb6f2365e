import { gmail_v1 } from 'googleapis'
import { GmailError } from "../errors.js"
import { callGmail, type GmailContext } from "./client.js"
import { modifyMessageLabels, normalizeMessageId } from "./messages.js"
import type { Label, LabelApplication } from "./types.js"

const toLabel = (label: gmail_v1.Schema$Label): Label => ({
  id: label.id ?? '',
  name: label.name ?? '',
  type: label.type === 'system' ? 'system' : 'user'
})

const findByName = (labels: Label[], name: string) =>
  labels.find(label => label.name.toLowerCase() === name.toLowerCase())

export const listLabels = async (ctx: GmailContext): Promise<Label[]> => {
  const data = await callGmail(ctx, 'List labels', gmail => gmail.users.labels.list({ userId: 'me' }))
  return (data.labels ?? []).map(toLabel)
}

/**
 * Lookup-or-create across two remote calls. Gmail has no compare-and-create,
 * so two processes can still race here; a 409 from the create is resolved by
 * reading the list again.
 */
export const findOrCreateLabel = async (ctx: GmailContext, name: string): Promise<{ label: Label, created: boolean }> => {
  const existing = findByName(await listLabels(ctx), name)
  if (existing) return { label: existing, created: false }

  try {
    const data = await callGmail(ctx, `Create label ${name}`, gmail => gmail.users.labels.create({
      userId: 'me',
      requestBody: { name, labelListVisibility: 'labelShow', messageListVisibility: 'show' }
    }), { retry: false })
    return { label: toLabel(data), created: true }
  } catch (error) {
    if (error instanceof GmailError && error.status === 409) {
      const raced = findByName(await listLabels(ctx), name)
      if (raced) return { label: raced, created: false }
    }
    throw error
  }
}

export const addLabelToMessage = async (ctx: GmailContext, messageId: string, labelName: string): Promise<LabelApplication> => {
  const id = normalizeMessageId(messageId)
  const name = labelName.trim()
  if (!name) throw new GmailError('Invalid', 'A label name is required')

  const { label, created } = await findOrCreateLabel(ctx, name)
  const state = await modifyMessageLabels(ctx, id, { add: [label.id] }, 'Add label to message')

  return { messageId: state.id, label, created, labelIds: state.labelIds }
}
