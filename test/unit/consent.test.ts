import net from 'net'
import { OAuth2Client } from 'google-auth-library'
import { launchAuthServer } from '../../src/oauth2.js'

jest.mock('open', () => jest.fn(async () => undefined))

const freePort = () => new Promise<number>((resolve, reject) => {
  const listener = net.createServer()
  listener.on('error', reject)
  listener.listen(0, () => {
    const address = listener.address()
    const port = typeof address === 'object' && address ? address.port : 0
    listener.close(() => resolve(port))
  })
})

describe('launchAuthServer', () => {
  let client: OAuth2Client
  let port: number

  const callback = (query: string) => fetch(`http://127.0.0.1:${port}/oauth2callback${query}`)

  beforeEach(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined)
    client = new OAuth2Client({ clientId: 'test-client-id', clientSecret: 'test-secret' })
    port = await freePort()
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('fails with an auth error when consent is declined', async () => {
    const consent = launchAuthServer(client, { port, timeoutMs: 5_000 })
    const declined = expect(consent).rejects.toMatchObject({ kind: 'AuthError', message: 'Consent was declined (access_denied)' })

    const response = await callback('?error=access_denied')

    expect(response.status).toEqual(400)
    await expect(response.text()).resolves.toEqual('Authentication failed')
    await declined
  })

  it('fails when the callback carries no code', async () => {
    const consent = launchAuthServer(client, { port, timeoutMs: 5_000 })
    const missing = expect(consent).rejects.toMatchObject({ kind: 'AuthError', message: 'No authorization code in OAuth callback' })

    const response = await callback('')

    expect(response.status).toEqual(400)
    await missing
  })

  it('gives up when nobody answers in time', async () => {
    await expect(launchAuthServer(client, { port, timeoutMs: 50 })).rejects.toMatchObject({
      kind: 'AuthError',
      message: 'Timed out waiting for OAuth consent'
    })
  })
})
