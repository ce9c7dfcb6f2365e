import { google, gmail_v1 } from 'googleapis'
import type { OAuth2Client } from 'google-auth-library'
import { REQUEST_TIMEOUT_MS, RETRY_DELAY_MS } from "../config.js"
import { toGmailError } from "../errors.js"
import { logger } from "../logger.js"
import type { CredentialSource } from "../oauth2.js"
import { withRetry } from "../retry.js"

type ApiCall<Params, Data> = (params: Params) => Promise<{ data: Data }>

/**
 * The slice of `gmail_v1.Gmail` the adapter talks to. Anything shaped like
 * this can stand in for the real client.
 */
export interface GmailApi {
  users: {
    labels: {
      list: ApiCall<gmail_v1.Params$Resource$Users$Labels$List, gmail_v1.Schema$ListLabelsResponse>
      create: ApiCall<gmail_v1.Params$Resource$Users$Labels$Create, gmail_v1.Schema$Label>
    }
    messages: {
      list: ApiCall<gmail_v1.Params$Resource$Users$Messages$List, gmail_v1.Schema$ListMessagesResponse>
      get: ApiCall<gmail_v1.Params$Resource$Users$Messages$Get, gmail_v1.Schema$Message>
      send: ApiCall<gmail_v1.Params$Resource$Users$Messages$Send, gmail_v1.Schema$Message>
      modify: ApiCall<gmail_v1.Params$Resource$Users$Messages$Modify, gmail_v1.Schema$Message>
      trash: ApiCall<gmail_v1.Params$Resource$Users$Messages$Trash, gmail_v1.Schema$Message>
    }
    threads: {
      get: ApiCall<gmail_v1.Params$Resource$Users$Threads$Get, gmail_v1.Schema$Thread>
    }
    drafts: {
      create: ApiCall<gmail_v1.Params$Resource$Users$Drafts$Create, gmail_v1.Schema$Draft>
    }
  }
}

export type GmailContext = {
  gmail: GmailApi
  credentials: CredentialSource
  retryDelayMs?: number
}

type CallOptions = {
  // Off for operations that must not run twice (send, draft, label creation)
  retry?: boolean
}

export const createGmailClient = (auth: OAuth2Client): GmailApi =>
  google.gmail({ version: 'v1', auth, timeout: REQUEST_TIMEOUT_MS })

export const callGmail = async <T>(
  ctx: GmailContext,
  operation: string,
  request: (gmail: GmailApi) => Promise<{ data: T }>,
  options: CallOptions = {}
): Promise<T> => {
  await ctx.credentials.obtain()
  logger('debug', `Gmail API call: ${operation}`)

  try {
    const { data } = await withRetry(() => request(ctx.gmail), {
      maxRetries: options.retry === false ? 0 : 1,
      baseDelayMs: ctx.retryDelayMs ?? RETRY_DELAY_MS,
      retryOn: error => toGmailError(error).kind === 'Transient',
      onRetry: (error, attempt) => logger('info', `Retrying ${operation}`, { attempt, error: toGmailError(error).message })
    })
    return data
  } catch (error) {
    const gmailError = toGmailError(error, operation)
    logger('error', `Gmail API call failed: ${operation}`, { kind: gmailError.kind, message: gmailError.message })
    throw gmailError
  }
}
