import type { GmailContext } from '../../src/gmail/index.js'
import { callTool, parseResourceUri, readResource } from '../../src/registry.js'
import { RESOURCES } from '../../src/resources.js'
import { TOOLS } from '../../src/tools.js'
import { FakeGmail, staticCredentials } from '../lib/fake-gmail.js'

describe('tool registry', () => {
  let gmail: FakeGmail
  let ctx: GmailContext

  beforeEach(() => {
    gmail = new FakeGmail()
    ctx = { gmail, credentials: staticCredentials(), retryDelayMs: 0 }
  })

  it('registers every tool', () => {
    expect(TOOLS.map(tool => tool.name)).toEqual([
      'get_labels_tool',
      'get_inbox_messages',
      'get_message_content_tool',
      'send_email',
      'search_emails_tool',
      'create_draft',
      'add_label_to_message',
      'get_thread',
      'mark_as_read',
      'mark_as_unread',
      'archive_message',
      'trash_message'
    ])
  })

  it('rejects an unknown tool', async () => {
    await expect(callTool(TOOLS, ctx, 'delete_everything', {})).rejects.toMatchObject({
      kind: 'NotSupported',
      message: 'Unknown tool: delete_everything'
    })
  })

  it('validates parameters before calling Gmail', async () => {
    await expect(callTool(TOOLS, ctx, 'get_inbox_messages', { max_results: 'five' })).rejects.toMatchObject({
      kind: 'Invalid',
      message: 'Invalid parameters for get_inbox_messages: max_results: Expected number, received string'
    })
    await expect(callTool(TOOLS, ctx, 'send_email', { to: 'bob@example.com', subject: 'Hi' })).rejects.toMatchObject({
      kind: 'Invalid',
      message: 'Invalid parameters for send_email: body: Required'
    })
    expect(gmail.calls).toEqual([])
  })

  it('applies parameter defaults', async () => {
    for (let i = 0; i < 12; i++) gmail.addMessage()

    await expect(callTool(TOOLS, ctx, 'get_inbox_messages', undefined)).resolves.toHaveLength(10)
    await expect(callTool(TOOLS, ctx, 'get_labels_tool', undefined)).resolves.toHaveLength(8)
  })

  it('dispatches named parameters to the adapter', async () => {
    const id = gmail.addMessage({ subject: 'Tool call' })

    await expect(callTool(TOOLS, ctx, 'get_message_content_tool', { message_id: id })).resolves.toMatchObject({ id, subject: 'Tool call' })
    await expect(callTool(TOOLS, ctx, 'add_label_to_message', { message_id: id, label_name: 'Follow up' })).resolves.toMatchObject({
      messageId: id,
      created: true,
      label: { name: 'Follow up', type: 'user' }
    })
  })
})

describe('parseResourceUri', () => {
  it('splits the path from a URI-decoded argument', () => {
    expect(parseResourceUri('mail://labels')).toEqual({ path: 'labels' })
    expect(parseResourceUri('mail://message/18c2f0')).toEqual({ path: 'message', argument: '18c2f0' })
    expect(parseResourceUri('mail://search/from%3Aalice%40example.com%20is%3Aunread')).toEqual({
      path: 'search',
      argument: 'from:alice@example.com is:unread'
    })
  })

  it('keeps slashes inside the argument', () => {
    expect(parseResourceUri('mail://search/after:2024/01/01')).toEqual({ path: 'search', argument: 'after:2024/01/01' })
  })

  it('rejects other schemes and malformed URIs', () => {
    expect(() => parseResourceUri('https://labels')).toThrow('Unsupported resource scheme: https')
    expect(() => parseResourceUri('labels')).toThrow('Malformed resource URI: labels')
    expect(() => parseResourceUri('mail://search/%E0%A4%A')).toThrow('Malformed resource URI: mail://search/%E0%A4%A')
  })
})

describe('readResource', () => {
  let gmail: FakeGmail
  let ctx: GmailContext

  beforeEach(() => {
    gmail = new FakeGmail()
    ctx = { gmail, credentials: staticCredentials(), retryDelayMs: 0 }
  })

  it('returns the same records as the matching tools', async () => {
    const id = gmail.addMessage({ from: 'alice@example.com', subject: 'Hello' })

    await expect(readResource(RESOURCES, ctx, 'mail://labels')).resolves.toEqual(await callTool(TOOLS, ctx, 'get_labels_tool', {}))
    await expect(readResource(RESOURCES, ctx, `mail://message/${id}`)).resolves.toMatchObject({ id, subject: 'Hello' })
    await expect(readResource(RESOURCES, ctx, 'mail://search/from%3Aalice%40example.com')).resolves.toMatchObject([{ id }])
    await expect(readResource(RESOURCES, ctx, 'mail://inbox')).resolves.toMatchObject([{ id }])
  })

  it('rejects unknown resources and argument mismatches', async () => {
    await expect(readResource(RESOURCES, ctx, 'mail://contacts')).rejects.toMatchObject({ kind: 'NotSupported' })
    await expect(readResource(RESOURCES, ctx, 'mail://message')).rejects.toMatchObject({
      kind: 'Invalid',
      message: 'Resource mail://message/{id} is missing its id'
    })
    await expect(readResource(RESOURCES, ctx, 'mail://labels/extra')).rejects.toMatchObject({ kind: 'Invalid' })
  })
})
