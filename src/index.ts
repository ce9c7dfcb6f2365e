#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import fs from "fs"
import { MCP_CONFIG_DIR } from "./config.js"
import { toGmailError } from "./errors.js"
import { createGmailClient } from "./gmail/index.js"
import { logger } from "./logger.js"
import { createCredentialStore } from "./oauth2.js"
import { createServer } from "./server.js"

const main = async () => {
  fs.mkdirSync(MCP_CONFIG_DIR, { recursive: true })

  const { client, store } = createCredentialStore()

  if (process.argv[2] === 'auth') {
    await store.reauthenticate()
    console.error('Authentication completed, credentials saved.')
    process.exit(0)
  }

  await store.ensureCredential()

  const server = createServer({ context: { gmail: createGmailClient(client), credentials: store } })
  const transport = new StdioServerTransport()
  await server.connect(transport)
  logger('info', 'Gmail MCP server listening on stdio')
}

main().catch(error => {
  const { kind, message } = toGmailError(error)
  logger('error', 'Gmail MCP server failed to start', { kind, message })
  console.error(`${kind}: ${message}`)
  process.exit(1)
})
