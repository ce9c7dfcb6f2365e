import { z } from "zod"

export type ErrorKind =
  | 'AuthError'
  | 'NotFound'
  | 'PermissionDenied'
  | 'RateLimited'
  | 'Transient'
  | 'Invalid'
  | 'NotSupported'

export class GmailError extends Error {
  readonly kind: ErrorKind
  readonly status?: number

  constructor(kind: ErrorKind, message: string, options: { status?: number, cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'GmailError'
    this.kind = kind
    this.status = options.status
  }
}

export type ErrorPayload = {
  error: {
    kind: ErrorKind
    message: string
  }
}

const RATE_LIMIT_REASONS = ['rateLimitExceeded', 'userRateLimitExceeded']

const NETWORK_ERROR_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED', 'EAI_AGAIN', 'ECONNABORTED', 'EPIPE']
const NETWORK_ERROR_MESSAGES = ['socket hang up', 'fetch failed', 'aborted', 'timeout']

// Shape of a gaxios error as thrown by googleapis and google-auth-library
const HttpErrorShape = z.object({
  message: z.string().optional(),
  name: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
  status: z.number().optional(),
  response: z.object({
    status: z.number().optional(),
    data: z.unknown()
  }).optional()
})

const GoogleErrorBody = z.object({
  error: z.union([
    z.string(),
    z.object({
      message: z.string().optional(),
      errors: z.array(z.object({ reason: z.string().optional() })).optional()
    })
  ]).optional(),
  error_description: z.string().optional()
})

const isNetworkFailure = (shape: z.infer<typeof HttpErrorShape>) => {
  if (typeof shape.code === 'string' && NETWORK_ERROR_CODES.includes(shape.code)) return true
  if (shape.name === 'AbortError') return true
  const message = shape.message?.toLowerCase() ?? ''
  return NETWORK_ERROR_MESSAGES.some(fragment => message.includes(fragment))
}

const classify = (status: number | undefined, reasons: string[], grantError: string | undefined, networkFailure: boolean): ErrorKind => {
  if (grantError === 'invalid_grant' || status === 401) return 'AuthError'
  // No HTTP response: transient only for a connection failure or timeout
  if (status === undefined) return networkFailure ? 'Transient' : 'Invalid'
  if (status === 403) return reasons.some(reason => RATE_LIMIT_REASONS.includes(reason)) ? 'RateLimited' : 'PermissionDenied'
  if (status === 404) return 'NotFound'
  if (status === 429) return 'RateLimited'
  if (status >= 500) return 'Transient'
  return 'Invalid'
}

export const toGmailError = (error: unknown, operation?: string): GmailError => {
  if (error instanceof GmailError) return error

  const parsed = HttpErrorShape.safeParse(error)
  const shape: z.infer<typeof HttpErrorShape> = parsed.success ? parsed.data : {}

  const status = shape.response?.status ?? shape.status ?? (typeof shape.code === 'number' ? shape.code : undefined)

  const parsedBody = GoogleErrorBody.safeParse(shape.response?.data)
  const body: z.infer<typeof GoogleErrorBody> = parsedBody.success ? parsedBody.data : {}

  const apiError = typeof body.error === 'object' ? body.error : undefined
  const grantError = typeof body.error === 'string' ? body.error : undefined
  const reasons = (apiError?.errors ?? []).flatMap(e => e.reason ? [e.reason] : [])

  const detail = apiError?.message || body.error_description || grantError || shape.message || String(error)
  const kind = classify(status, reasons, grantError, isNetworkFailure(shape))

  return new GmailError(kind, operation ? `${operation}: ${detail}` : detail, { status, cause: error })
}

export const toErrorPayload = (error: unknown): ErrorPayload => {
  const { kind, message } = toGmailError(error)
  return { error: { kind, message } }
}
