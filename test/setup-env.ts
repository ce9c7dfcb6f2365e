import fs from 'fs'
import os from 'os'
import path from 'path'

// Config is read at import time, so this must run before any test module loads src/
const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gmail-mcp-test-'))

process.env.MCP_CONFIG_DIR = dir
process.env.LOG_PATH = path.join(dir, 'test.log')
process.env.GMAIL_CREDENTIALS_PATH = path.join(dir, 'credentials.json')
