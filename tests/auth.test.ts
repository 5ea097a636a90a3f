import { beforeEach, describe, expect, it, vi } from 'vitest'
import { extractCsrfToken, LoginFlow } from '../src/auth.js'
import { cognitoLoginPage } from './fixtures/api-responses.js'
import { FakeTransport } from './fixtures/fake-transport.js'

vi.mock('../src/logger.js', () => ({
  default: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}))

const BASE = 'https://melcloudhome.com'
const LOGIN_PAGE_URL = 'https://auth.test.amazoncognito.com/login?client_id=test'
const credentials = { email: 'test@example.com', password: 'test-password' }

describe('auth', () => {
  describe('extractCsrfToken', () => {
    it('should read the hidden _csrf input', () => {
      expect(extractCsrfToken(cognitoLoginPage)).toBe('test-csrf-token')
    })

    it('should accept the value attribute before the name', () => {
      expect(extractCsrfToken('<input type="hidden" value="abc123" name="_csrf">')).toBe('abc123')
    })

    it('should return null when the form has no token', () => {
      expect(extractCsrfToken('<form></form>')).toBeNull()
    })
  })

  describe('LoginFlow', () => {
    let transport: FakeTransport
    let flow: LoginFlow

    beforeEach(() => {
      transport = new FakeTransport()
      flow = new LoginFlow(transport, { baseUrl: BASE, settleMs: 0 })
      transport.on('GET', '/bff/login', { status: 200, resolvedUrl: LOGIN_PAGE_URL, text: cognitoLoginPage })
    })

    it('should accept a landing on a subdomain of the app host', async () => {
      transport.on('POST', '/login', { status: 200, resolvedUrl: 'https://app.melcloudhome.com/dashboard' })
      await expect(flow.login(credentials)).resolves.toBeUndefined()
    })

    it('should report the message of an error page', async () => {
      transport.on('POST', '/login', {
        status: 200,
        resolvedUrl: `${BASE}/error`,
        text: '<div class="alert error-message">Account locked</div>',
      })

      await expect(flow.login(credentials)).rejects.toThrow('Authentication failed: Account locked')
    })

    it('should fall back to the status when an error page has no message', async () => {
      transport.on('POST', '/login', { status: 500, resolvedUrl: `${BASE}/callback`, text: '' })
      await expect(flow.login(credentials)).rejects.toThrow('Authentication failed: HTTP 500')
    })

    it('should reject a redirect to an unknown host', async () => {
      transport.on('POST', '/login', { status: 200, resolvedUrl: 'https://elsewhere.test/' })
      await expect(flow.login(credentials)).rejects.toThrow('Authentication failed: unexpected redirect to elsewhere.test')
    })

    it('should reject a login page without a form token', async () => {
      const noToken = new FakeTransport().on('GET', '/bff/login', {
        status: 200,
        resolvedUrl: LOGIN_PAGE_URL,
        text: '<html></html>',
      })
      const noTokenFlow = new LoginFlow(noToken, { baseUrl: BASE, settleMs: 0 })

      await expect(noTokenFlow.login(credentials)).rejects.toThrow('Unable to extract the login form token')
      expect(noToken.redirectRequests).toHaveLength(1)
    })

    it('should wrap transport failures', async () => {
      const failing = new FakeTransport().on('GET', '/bff/login', new Error('getaddrinfo ENOTFOUND'))
      const failingFlow = new LoginFlow(failing, { baseUrl: BASE, settleMs: 0 })

      await expect(failingFlow.login(credentials)).rejects.toThrow('Login failed: getaddrinfo ENOTFOUND')
      expect(failing.cookiesCleared).toBe(2)
    })

    it('should clear cookies on logout even when the request fails', async () => {
      transport.on('GET', '/bff/logout', new Error('timeout'))

      await expect(flow.logout()).resolves.toBeUndefined()
      expect(transport.cookiesCleared).toBe(1)
    })
  })
})
