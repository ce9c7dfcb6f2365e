import { gmail_v1 } from 'googleapis'
import { GmailError } from "../errors.js"
import type { AttachmentInfo, NewMessage } from "./types.js"

type MessagePart = gmail_v1.Schema$MessagePart
type MessagePartHeader = gmail_v1.Schema$MessagePartHeader

const LINE_BREAK = /[\r\n]/
const PRINTABLE_ASCII = /^[\x20-\x7e]*$/

export const findHeader = (headers: MessagePartHeader[] | undefined, name: string) => {
  if (!headers || !Array.isArray(headers) || !name) return undefined
  return headers.find(h => h?.name?.toLowerCase() === name.toLowerCase())?.value ?? undefined
}

export const decodeBase64Url = (data: string) => Buffer.from(data, 'base64url').toString('utf-8')

/**
 * Concatenates every text/plain part, walking the MIME tree breadth-first.
 */
export const getBodyText = (payload: MessagePart | undefined): string => {
  const queue = payload ? [payload] : []
  let content = ''

  while (queue.length) {
    const part = queue.shift()
    if (!part) break
    if (part.parts) queue.push(...part.parts)
    if (part.mimeType === 'text/plain' && part.body?.data) content += decodeBase64Url(part.body.data)
  }

  return content
}

export const getAttachments = (payload: MessagePart | undefined): AttachmentInfo[] => {
  if (!payload) return []

  const own: AttachmentInfo[] = payload.filename && payload.body?.attachmentId
    ? [{
      attachmentId: payload.body.attachmentId,
      filename: payload.filename,
      mimeType: payload.mimeType ?? 'application/octet-stream',
      size: payload.body.size ?? 0
    }]
    : []

  return [...own, ...(payload.parts ?? []).flatMap(getAttachments)]
}

// RFC 2047 encoded-word for anything outside printable ASCII
const encodeHeader = (value: string) =>
  PRINTABLE_ASCII.test(value) ? value : `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`

const wrapBase64 = (text: string) =>
  (Buffer.from(text, 'utf-8').toString('base64').match(/.{1,76}/g) ?? []).join('\r\n')

export const constructRawMessage = (params: NewMessage) => {
  if (LINE_BREAK.test(params.to)) throw new GmailError('Invalid', 'Recipient must not contain line breaks')
  if (LINE_BREAK.test(params.subject)) throw new GmailError('Invalid', 'Subject must not contain line breaks')

  const message = [
    `To: ${params.to}`,
    `Subject: ${params.subject ? encodeHeader(params.subject) : '(No Subject)'}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: base64',
    '',
    wrapBase64(params.body)
  ]

  return Buffer.from(message.join('\r\n')).toString('base64url')
}
