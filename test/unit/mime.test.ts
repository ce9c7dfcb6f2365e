import { GmailError } from '../../src/errors.js'
import { constructRawMessage, findHeader, getAttachments, getBodyText } from '../../src/gmail/mime.js'

const decode = (raw: string) => Buffer.from(raw, 'base64url').toString('utf-8')
const data = (text: string) => Buffer.from(text, 'utf-8').toString('base64url')

describe('constructRawMessage', () => {
  it('builds a base64url RFC 2822 message with a base64 text body', () => {
    const raw = constructRawMessage({ to: 'bob@example.com', subject: 'Hi', body: 'Hi there' })

    expect(raw).not.toMatch(/[+/=]/)
    expect(decode(raw)).toEqual([
      'To: bob@example.com',
      'Subject: Hi',
      'MIME-Version: 1.0',
      'Content-Type: text/plain; charset="UTF-8"',
      'Content-Transfer-Encoding: base64',
      '',
      'SGkgdGhlcmU='
    ].join('\r\n'))
  })

  it('encodes a non-ASCII subject as an RFC 2047 encoded-word', () => {
    const raw = constructRawMessage({ to: 'bob@example.com', subject: 'Grüße', body: '' })
    expect(decode(raw).split('\r\n')[1]).toEqual('Subject: =?UTF-8?B?R3LDvMOfZQ==?=')
  })

  it('fills in a placeholder for an empty subject', () => {
    const raw = constructRawMessage({ to: 'bob@example.com', subject: '', body: 'x' })
    expect(decode(raw).split('\r\n')[1]).toEqual('Subject: (No Subject)')
  })

  it('keeps line breaks in the body and wraps it at 76 characters', () => {
    const body = 'a'.repeat(100)
    const lines = decode(constructRawMessage({ to: 'bob@example.com', subject: 'Long', body })).split('\r\n').slice(6)

    expect(lines.map(line => line.length)).toEqual([76, 60])
    expect(Buffer.from(lines.join(''), 'base64').toString('utf-8')).toEqual(body)

    const multiline = decode(constructRawMessage({ to: 'bob@example.com', subject: 'Two', body: 'Hello\nSecond line' }))
    expect(multiline.split('\r\n')[6]).toEqual('SGVsbG8KU2Vjb25kIGxpbmU=')
  })

  it('rejects header injection through the recipient or the subject', () => {
    const badRecipient = () => constructRawMessage({ to: 'bob@example.com\r\nBcc: eve@example.com', subject: 'Hi', body: '' })
    const badSubject = () => constructRawMessage({ to: 'bob@example.com', subject: 'Hi\nBcc: eve@example.com', body: '' })

    expect(badRecipient).toThrow(GmailError)
    expect(badRecipient).toThrow('Recipient must not contain line breaks')
    expect(badSubject).toThrow('Subject must not contain line breaks')
  })
})

describe('getBodyText', () => {
  it('concatenates text/plain parts breadth-first and skips html', () => {
    const payload = {
      mimeType: 'multipart/mixed',
      parts: [
        {
          mimeType: 'multipart/alternative',
          parts: [
            { mimeType: 'text/plain', body: { data: data('inner') } },
            { mimeType: 'text/html', body: { data: data('<p>inner</p>') } }
          ]
        },
        { mimeType: 'text/plain', body: { data: data('outer') } }
      ]
    }

    expect(getBodyText(payload)).toEqual('outerinner')
  })

  it('returns an empty string without a payload or text part', () => {
    expect(getBodyText(undefined)).toEqual('')
    expect(getBodyText({ mimeType: 'text/html', body: { data: data('<b>x</b>') } })).toEqual('')
  })
})

describe('getAttachments', () => {
  it('lists nested parts that carry a filename and an attachment id', () => {
    const payload = {
      mimeType: 'multipart/mixed',
      parts: [
        { mimeType: 'text/plain', filename: '', body: { data: data('see attached') } },
        {
          mimeType: 'multipart/related',
          parts: [{ mimeType: 'image/png', filename: 'chart.png', body: { attachmentId: 'att-2', size: 2048 } }]
        },
        { mimeType: 'application/pdf', filename: 'report.pdf', body: { attachmentId: 'att-1', size: 1024 } }
      ]
    }

    expect(getAttachments(payload)).toEqual([
      { attachmentId: 'att-2', filename: 'chart.png', mimeType: 'image/png', size: 2048 },
      { attachmentId: 'att-1', filename: 'report.pdf', mimeType: 'application/pdf', size: 1024 }
    ])
  })
})

describe('findHeader', () => {
  it('matches header names case-insensitively', () => {
    const headers = [{ name: 'subject', value: 'Quarterly numbers' }, { name: 'From', value: 'alice@example.com' }]

    expect(findHeader(headers, 'Subject')).toEqual('Quarterly numbers')
    expect(findHeader(headers, 'Cc')).toBeUndefined()
    expect(findHeader(undefined, 'From')).toBeUndefined()
  })
})
