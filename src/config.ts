import os from "os"
import path from "path"

const toInt = (value: string | undefined, fallback: number) => {
  const parsed = value ? parseInt(value, 10) : NaN
  return Number.isNaN(parsed) ? fallback : parsed
}

export const MCP_CONFIG_DIR = process.env.MCP_CONFIG_DIR || path.join(os.homedir(), '.gmail-mcp')

export const OAUTH_PATH = process.env.GMAIL_OAUTH_PATH || path.join(MCP_CONFIG_DIR, 'gcp-oauth.keys.json')
export const CREDENTIALS_PATH = process.env.GMAIL_CREDENTIALS_PATH || path.join(MCP_CONFIG_DIR, 'credentials.json')
export const LOG_PATH = process.env.LOG_PATH || path.join(MCP_CONFIG_DIR, 'gmail-mcp.log')

export const CLIENT_ID = process.env.CLIENT_ID
export const CLIENT_SECRET = process.env.CLIENT_SECRET

// Loopback port for the consent redirect
export const AUTH_PORT = toInt(process.env.AUTH_PORT, 3000)

export const REQUEST_TIMEOUT_MS = toInt(process.env.REQUEST_TIMEOUT_MS, 30_000)
export const RETRY_DELAY_MS = toInt(process.env.RETRY_DELAY_MS, 1_000)

export const SCOPES = [
  'https://www.googleapis.com/auth/gmail.readonly',
  'https://www.googleapis.com/auth/gmail.send',
  'https://www.googleapis.com/auth/gmail.compose',
  'https://www.googleapis.com/auth/gmail.modify',
  'https://www.googleapis.com/auth/gmail.labels'
]
