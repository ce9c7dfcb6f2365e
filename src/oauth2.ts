import fs from "fs"
import http from "http"
import path from "path"
import open from "open"
import { OAuth2Client, type Credentials } from "google-auth-library"
import { z } from "zod"
import { AUTH_PORT, CLIENT_ID, CLIENT_SECRET, CREDENTIALS_PATH, OAUTH_PATH, SCOPES } from "./config.js"
import { GmailError, toGmailError } from "./errors.js"
import { logger } from "./logger.js"

const EXPIRY_SKEW_MS = 60_000
const CONSENT_TIMEOUT_MS = 5 * 60_000

export type Credential = {
  accessToken: string
  refreshToken?: string
  /** Epoch milliseconds */
  expiryDate: number
  scopes: string[]
  tokenType?: string
}

export interface CredentialSource {
  obtain(): Promise<Credential>
}

/**
 * The two network-facing steps of the token lifecycle, plus the hook that
 * hands a usable credential to whatever client issues API calls.
 */
export interface OAuthFlow {
  refresh(refreshToken: string): Promise<Credentials>
  consent(): Promise<Credentials>
  apply(credential: Credential): void
}

const StoredToken = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  scope: z.string().nullish(),
  token_type: z.string().nullish()
}).refine(token => Boolean(token.access_token || token.refresh_token), 'has neither access_token nor refresh_token')

const OAuthKeys = z.object({
  client_id: z.string(),
  client_secret: z.string().optional()
})

const OAuthKeysFile = z.object({
  installed: OAuthKeys.optional(),
  web: OAuthKeys.optional()
})

export const toCredential = (tokens: unknown, source: string, previous?: Credential): Credential => {
  const parsed = StoredToken.safeParse(tokens)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => [issue.path.join('.'), issue.message].filter(Boolean).join(' ')).join('; ')
    throw new GmailError('AuthError', `${source} is not a valid OAuth2 token (${issues})`)
  }

  const token = parsed.data
  return {
    accessToken: token.access_token ?? '',
    refreshToken: token.refresh_token ?? previous?.refreshToken,
    expiryDate: token.expiry_date ?? 0,
    scopes: token.scope ? token.scope.split(' ').filter(Boolean) : previous?.scopes ?? [],
    tokenType: token.token_type ?? previous?.tokenType
  }
}

export const toTokens = (credential: Credential): Credentials => ({
  access_token: credential.accessToken,
  refresh_token: credential.refreshToken,
  expiry_date: credential.expiryDate,
  scope: credential.scopes.join(' '),
  token_type: credential.tokenType
})

type CredentialStoreOptions = {
  flow: OAuthFlow
  tokenPath?: string
  scopes?: string[]
  now?: () => number
}

/**
 * Owns the persisted OAuth2 token. Every read, refresh and consent runs
 * behind a single promise queue so at most one refresh is in flight, and at
 * most one interactive consent happens per process.
 */
export class CredentialStore implements CredentialSource {
  private readonly flow: OAuthFlow
  private readonly tokenPath: string
  private readonly scopes: string[]
  private readonly now: () => number

  private credential?: Credential
  private queue: Promise<void> = Promise.resolve()
  private consented = false
  private bootstrapped = false

  constructor(options: CredentialStoreOptions) {
    this.flow = options.flow
    this.tokenPath = options.tokenPath ?? CREDENTIALS_PATH
    this.scopes = options.scopes ?? SCOPES
    this.now = options.now ?? Date.now
  }

  /** Returns a non-expired credential. Prompts for consent only before bootstrap. */
  obtain(): Promise<Credential> {
    return this.exclusive(() => this.resolve(!this.bootstrapped))
  }

  /** Process-start bootstrap: the one place interactive consent is expected. */
  async ensureCredential(): Promise<Credential> {
    try {
      return await this.exclusive(() => this.resolve(true))
    } finally {
      this.bootstrapped = true
    }
  }

  reauthenticate(): Promise<Credential> {
    return this.exclusive(() => this.consent(true))
  }

  invalidate() {
    this.credential = undefined
    fs.rmSync(this.tokenPath, { force: true })
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task)
    this.queue = run.then(() => undefined, () => undefined)
    return run
  }

  private async resolve(allowConsent: boolean): Promise<Credential> {
    const current = this.credential ?? this.load()

    if (!current || !this.hasScopes(current)) return this.consent(allowConsent)
    if (!this.isExpired(current)) return this.use(current)
    if (!current.refreshToken) return this.consent(allowConsent)

    let refreshed: Credential
    try {
      refreshed = toCredential(await this.flow.refresh(current.refreshToken), 'Refreshed token', current)
    } catch (error) {
      const refreshError = toGmailError(error, 'Token refresh failed')
      if (refreshError.kind !== 'AuthError') throw refreshError

      logger('info', 'Refresh token rejected, removing stored token', { error: refreshError.message })
      this.invalidate()
      return this.consent(allowConsent)
    }

    logger('info', 'Refreshed access token', { expiryDate: new Date(refreshed.expiryDate).toISOString() })
    this.save(refreshed)
    return this.use(refreshed)
  }

  private async consent(allowConsent: boolean): Promise<Credential> {
    if (!allowConsent || this.consented) {
      throw new GmailError('AuthError', 'No valid Gmail credentials, please re-authenticate by running: gmail-mcp auth')
    }
    this.consented = true

    logger('info', 'Starting interactive OAuth consent')
    const credential = toCredential(await this.flow.consent(), 'Consent response')
    this.save(credential)
    logger('info', 'OAuth consent completed', { scopes: credential.scopes })
    return this.use(credential)
  }

  private load(): Credential | undefined {
    if (!fs.existsSync(this.tokenPath)) return undefined

    let stored: unknown
    try {
      stored = JSON.parse(fs.readFileSync(this.tokenPath, 'utf8'))
    } catch (error) {
      throw new GmailError('AuthError', `Stored token ${this.tokenPath} is corrupt, please re-authenticate by running: gmail-mcp auth`, { cause: error })
    }
    return toCredential(stored, `Stored token ${this.tokenPath}`)
  }

  private save(credential: Credential) {
    fs.mkdirSync(path.dirname(this.tokenPath), { recursive: true })
    const tmpPath = `${this.tokenPath}.tmp`
    fs.writeFileSync(tmpPath, JSON.stringify(toTokens(credential), null, 2), { mode: 0o600 })
    fs.renameSync(tmpPath, this.tokenPath)
  }

  private use(credential: Credential): Credential {
    this.credential = credential
    this.flow.apply(credential)
    return credential
  }

  private isExpired(credential: Credential) {
    return !credential.accessToken || credential.expiryDate - EXPIRY_SKEW_MS <= this.now()
  }

  // Tokens saved without a scope string predate scope tracking; accept them
  private hasScopes(credential: Credential) {
    if (credential.scopes.length === 0) return true
    return this.scopes.every(scope => credential.scopes.includes(scope))
  }
}

type AuthServerOptions = {
  scopes?: string[]
  port?: number
  timeoutMs?: number
}

export const launchAuthServer = (client: OAuth2Client, options: AuthServerOptions = {}): Promise<Credentials> => {
  const port = options.port ?? AUTH_PORT
  const redirectUri = `http://localhost:${port}/oauth2callback`
  const authUrl = client.generateAuthUrl({
    access_type: 'offline',
    prompt: 'consent',
    scope: options.scopes ?? SCOPES,
    redirect_uri: redirectUri
  })

  return new Promise((resolve, reject) => {
    const server = http.createServer(async (req, res) => {
      if (!req.url?.startsWith('/oauth2callback')) {
        res.writeHead(404, { Connection: 'close' })
        res.end()
        return
      }

      const url = new URL(req.url, redirectUri)
      try {
        const denied = url.searchParams.get('error')
        if (denied) throw new GmailError('AuthError', `Consent was declined (${denied})`)

        const code = url.searchParams.get('code')
        if (!code) throw new GmailError('AuthError', 'No authorization code in OAuth callback')

        const { tokens } = await client.getToken({ code, redirect_uri: redirectUri })
        res.writeHead(200, { Connection: 'close' })
        res.end('Authentication successful! You can close this window.')
        finish(() => resolve(tokens))
      } catch (error) {
        res.writeHead(400, { Connection: 'close' })
        res.end('Authentication failed')
        finish(() => reject(toGmailError(error, 'OAuth consent')))
      }
    })

    const timer = setTimeout(() => {
      finish(() => reject(new GmailError('AuthError', 'Timed out waiting for OAuth consent')))
    }, options.timeoutMs ?? CONSENT_TIMEOUT_MS)

    const finish = (settle: () => void) => {
      clearTimeout(timer)
      server.close()
      settle()
    }

    server.on('error', error => finish(() => reject(new GmailError('AuthError', `OAuth callback server: ${error.message}`, { cause: error }))))
    server.listen(port, () => {
      // stdout belongs to the MCP stdio transport
      console.error(`Please visit this URL to authorize Gmail access:\n${authUrl}`)
      open(authUrl).catch(error => logger('error', 'Could not open a browser for consent', { error: error instanceof Error ? error.message : String(error) }))
    })
  })
}

export class GoogleOAuthFlow implements OAuthFlow {
  constructor(readonly client: OAuth2Client, private readonly options: AuthServerOptions = {}) {}

  async refresh(refreshToken: string): Promise<Credentials> {
    this.client.setCredentials({ refresh_token: refreshToken })
    await this.client.getAccessToken()
    return this.client.credentials
  }

  consent(): Promise<Credentials> {
    return launchAuthServer(this.client, this.options)
  }

  // Without a refresh token or expiry the client cannot refresh behind the store's back
  apply(credential: Credential) {
    this.client.setCredentials({ access_token: credential.accessToken, token_type: credential.tokenType })
  }
}

const loadOAuthKeys = (keysPath: string) => {
  if (!fs.existsSync(keysPath)) {
    throw new GmailError('AuthError', `OAuth keys file not found at ${keysPath}, set CLIENT_ID and CLIENT_SECRET or place gcp-oauth.keys.json there`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(keysPath, 'utf8'))
  } catch (error) {
    throw new GmailError('AuthError', `OAuth keys file ${keysPath} is not valid JSON`, { cause: error })
  }

  const parsed = OAuthKeysFile.safeParse(raw)
  const keys = parsed.success ? parsed.data.installed ?? parsed.data.web : undefined
  if (!keys) throw new GmailError('AuthError', `OAuth keys file ${keysPath} should contain either "installed" or "web" credentials`)
  return keys
}

export const createOAuth2Client = (keysPath = OAUTH_PATH): OAuth2Client => {
  const keys = CLIENT_ID ? { client_id: CLIENT_ID, client_secret: CLIENT_SECRET } : loadOAuthKeys(keysPath)
  return new OAuth2Client({
    clientId: keys.client_id,
    clientSecret: keys.client_secret,
    redirectUri: `http://localhost:${AUTH_PORT}/oauth2callback`
  })
}

export const createCredentialStore = () => {
  const client = createOAuth2Client()
  const store = new CredentialStore({ flow: new GoogleOAuthFlow(client) })
  return { client, store }
}
