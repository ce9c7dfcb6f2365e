#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from "commander"
import fs from "fs"
import { MCP_CONFIG_DIR } from "./config.js"
import { toGmailError } from "./errors.js"
import {
  formatDraft,
  formatInbox,
  formatLabelApplication,
  formatLabels,
  formatMessage,
  formatSearchResults,
  formatSent,
  formatState,
  formatThread
} from "./format.js"
import {
  addLabelToMessage,
  archiveMessage,
  createDraft,
  createGmailClient,
  getInboxMessages,
  getMessage,
  getThread,
  listLabels,
  markAsRead,
  markAsUnread,
  searchMessages,
  sendEmail,
  trashMessage,
  type GmailContext,
  type NewMessage
} from "./gmail/index.js"
import { logger } from "./logger.js"
import { createCredentialStore } from "./oauth2.js"

export type CliDeps = {
  /** Called once a command has parsed; this is where credentials are bootstrapped */
  connect: () => Promise<GmailContext>
  writeOut?: (text: string) => void
  writeErr?: (text: string) => void
}

const stdout = (text: string) => {
  process.stdout.write(text)
}

const stderr = (text: string) => {
  process.stderr.write(text)
}

const parseMax = (value: string) => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError('Must be a positive integer.')
  return parsed
}

export const createProgram = (deps: CliDeps) => {
  const writeOut = deps.writeOut ?? stdout
  const writeErr = deps.writeErr ?? stderr
  const print = (text: string) => writeOut(text + '\n')

  let connection: Promise<GmailContext> | undefined
  const connect = () => connection ??= deps.connect()

  const program = new Command()
    .name('gmail-cli')
    .description('Read, search, send and organize Gmail messages')
    .version('1.0.0')
    .exitOverride()
    .configureOutput({ writeOut, writeErr })
    .showHelpAfterError()

  program
    .command('labels')
    .description('List all labels')
    .action(async () => {
      print(formatLabels(await listLabels(await connect())))
    })

  program
    .command('inbox')
    .description('Show the most recent inbox messages')
    .option('--max <n>', 'Maximum number of messages (1-50)', parseMax, 10)
    .action(async (options: { max: number }) => {
      print(formatInbox(await getInboxMessages(await connect(), options.max), options.max))
    })

  program
    .command('message')
    .description('Show the full content of a message')
    .argument('<id>', 'Message ID')
    .action(async (id: string) => {
      print(formatMessage(await getMessage(await connect(), id)))
    })

  program
    .command('search')
    .description('Search messages using Gmail search syntax')
    .argument('<query>', 'Gmail search query, e.g. "from:alice@example.com is:unread"')
    .option('--max <n>', 'Maximum number of results (1-100)', parseMax, 10)
    .action(async (query: string, options: { max: number }) => {
      print(formatSearchResults(query, await searchMessages(await connect(), query, options.max)))
    })

  const compose = (name: string, description: string) => program
    .command(name)
    .description(description)
    .requiredOption('--to <address>', 'Recipient email address')
    .requiredOption('--subject <subject>', 'Email subject')
    .requiredOption('--body <body>', 'Plain text body')

  compose('send', 'Send a plain text email')
    .action(async (options: NewMessage) => {
      print(formatSent(options.to, await sendEmail(await connect(), options)))
    })

  compose('draft', 'Create a plain text draft')
    .action(async (options: NewMessage) => {
      print(formatDraft(await createDraft(await connect(), options)))
    })

  program
    .command('add-label')
    .description('Add a label to a message, creating the label if needed')
    .argument('<id>', 'Message ID')
    .argument('<label>', 'Label name')
    .action(async (id: string, label: string) => {
      print(formatLabelApplication(await addLabelToMessage(await connect(), id, label)))
    })

  program
    .command('thread')
    .description('Show every message in a thread')
    .argument('<id>', 'Thread ID')
    .action(async (id: string) => {
      print(formatThread(await getThread(await connect(), id)))
    })

  const stateCommands = [
    { name: 'mark-read', description: 'Mark a message as read', action: markAsRead, done: 'marked as read' },
    { name: 'mark-unread', description: 'Mark a message as unread', action: markAsUnread, done: 'marked as unread' },
    { name: 'archive', description: 'Archive a message', action: archiveMessage, done: 'archived' },
    { name: 'trash', description: 'Move a message to the trash', action: trashMessage, done: 'moved to trash' }
  ]

  for (const { name, description, action, done } of stateCommands) {
    program
      .command(name)
      .description(description)
      .argument('<id>', 'Message ID')
      .action(async (id: string) => {
        print(formatState(await action(await connect(), id), done))
      })
  }

  return program
}

/** Runs one command line and resolves to the process exit code. */
export const run = async (argv: string[], deps: CliDeps): Promise<number> => {
  const program = createProgram(deps)
  try {
    await program.parseAsync(argv, { from: 'user' })
    return 0
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode

    const { kind, message } = toGmailError(error)
    logger('error', `gmail-cli ${argv[0] ?? ''} failed`, { kind, message })
    const writeErr = deps.writeErr ?? stderr
    writeErr(`${kind}: ${message}\n`)
    return 1
  }
}

const connect = async (): Promise<GmailContext> => {
  fs.mkdirSync(MCP_CONFIG_DIR, { recursive: true })
  const { client, store } = createCredentialStore()
  await store.ensureCredential()
  return { gmail: createGmailClient(client), credentials: store }
}

if (require.main === module) {
  run(process.argv.slice(2), { connect }).then(code => {
    process.exitCode = code
  })
}
