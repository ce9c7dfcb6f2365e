import { LOG_PATH } from "./config.js"
import fs from "fs"
import path from "path"

type LogLevel = 'info' | 'debug' | 'trace' | 'error'

type Log = {
  timestamp: string
  level: LogLevel
  message: string
  data?: unknown
}

let logDirReady = false

// stdout carries the MCP stdio channel, so logs only ever go to the file or stderr
export const logger = (level: LogLevel, message: string, data?: unknown) => {
  const log: Log = { timestamp: new Date().toISOString(), level, message }
  if (data !== undefined) log.data = data

  try {
    if (!logDirReady) {
      fs.mkdirSync(path.dirname(LOG_PATH), { recursive: true })
      logDirReady = true
    }
    fs.appendFileSync(LOG_PATH, JSON.stringify(log) + '\n')
  } catch (error) {
    console.error('Error writing to log file:', { error: error instanceof Error ? error.message : String(error) })
  }
}
