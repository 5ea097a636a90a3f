import { beforeEach, describe, expect, it, vi } from 'vitest'
import { extractUrlPath, formatAxiosError, HttpClient } from '../src/http.js'

const { request } = vi.hoisted(() => ({ request: vi.fn() }))

vi.mock('axios', () => ({
  default: {
    create: vi.fn(() => ({ request })),
    isAxiosError: vi.fn(() => false),
  },
}))

vi.mock('../src/logger.js', () => ({
  default: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}))

const BASE = 'https://melcloudhome.com'

const reply = (status: number, headers: Record<string, unknown> = {}, data: unknown = '') => ({
  status,
  headers,
  data,
})

describe('HttpClient', () => {
  let http: HttpClient

  beforeEach(() => {
    request.mockReset()
    http = new HttpClient({ baseUrl: BASE, requestSpacingMs: 0 })
  })

  describe('request', () => {
    it('should resolve relative URLs against the base URL', async () => {
      request.mockResolvedValueOnce(reply(200, {}, 'ok'))

      const response = await http.request({ method: 'GET', url: '/api/user/context' })

      expect(request.mock.calls[0]?.[0]).toMatchObject({ method: 'GET', url: `${BASE}/api/user/context` })
      expect(response).toEqual({ status: 200, headers: {}, text: 'ok', resolvedUrl: `${BASE}/api/user/context` })
    })

    it('should store cookies and send them on later requests', async () => {
      request
        .mockResolvedValueOnce(reply(200, { 'set-cookie': ['session=abc; Path=/; HttpOnly', 'csrf=xyz'] }))
        .mockResolvedValueOnce(reply(200))

      await http.request({ method: 'GET', url: '/first' })
      await http.request({ method: 'GET', url: '/second' })

      expect(http.cookieCount).toBe(2)
      expect(request.mock.calls[1]?.[0].headers).toEqual({ Cookie: 'session=abc; csrf=xyz' })
    })

    it('should drop cookies the server expires', async () => {
      request
        .mockResolvedValueOnce(reply(200, { 'set-cookie': ['session=abc', 'csrf=xyz'] }))
        .mockResolvedValueOnce(reply(200, { 'set-cookie': ['session=; Max-Age=0'] }))

      await http.request({ method: 'GET', url: '/first' })
      await http.request({ method: 'GET', url: '/second' })

      expect(http.cookieCount).toBe(1)
    })

    it('should clear the cookie jar', async () => {
      request.mockResolvedValueOnce(reply(200, { 'set-cookie': ['session=abc'] }))
      await http.request({ method: 'GET', url: '/first' })

      http.clearCookies()

      expect(http.cookieCount).toBe(0)
    })

    it('should return an empty text for non-string bodies', async () => {
      request.mockResolvedValueOnce(reply(200, { 'content-type': 'application/json' }, undefined))

      const response = await http.request({ method: 'GET', url: '/empty' })

      expect(response.text).toBe('')
      expect(response.headers).toEqual({ 'content-type': 'application/json' })
    })
  })

  describe('followRedirects', () => {
    it('should follow redirects as GET and drop the body and query params', async () => {
      request
        .mockResolvedValueOnce(reply(302, { location: 'https://auth.test.amazoncognito.com/login?client_id=test' }))
        .mockResolvedValueOnce(reply(200, {}, '<html>'))

      const response = await http.followRedirects({
        method: 'POST',
        url: '/bff/login',
        params: { returnUrl: '/dashboard' },
        body: 'a=1',
      })

      expect(request.mock.calls[0]?.[0]).toMatchObject({
        method: 'POST',
        params: { returnUrl: '/dashboard' },
        data: 'a=1',
      })
      expect(request.mock.calls[1]?.[0]).toMatchObject({
        method: 'GET',
        url: 'https://auth.test.amazoncognito.com/login?client_id=test',
        params: undefined,
        data: undefined,
      })
      expect(response.resolvedUrl).toBe('https://auth.test.amazoncognito.com/login?client_id=test')
      expect(response.text).toBe('<html>')
    })

    it('should resolve relative locations against the current URL', async () => {
      request.mockResolvedValueOnce(reply(301, { location: '/dashboard' })).mockResolvedValueOnce(reply(200))

      const response = await http.followRedirects({ method: 'GET', url: '/bff/callback' })

      expect(response.resolvedUrl).toBe(`${BASE}/dashboard`)
    })

    it('should give up after too many redirects', async () => {
      request.mockResolvedValue(reply(302, { location: '/loop' }))

      await expect(http.followRedirects({ method: 'GET', url: '/loop' }, 3)).rejects.toThrow(
        'Too many redirects (max 3)',
      )
      expect(request).toHaveBeenCalledTimes(3)
    })
  })
})

describe('extractUrlPath', () => {
  it('should return the path of absolute and relative URLs', () => {
    expect(extractUrlPath('https://melcloudhome.com/api/user/context?x=1')).toBe('/api/user/context')
    expect(extractUrlPath('/api/ataunit/1?x=1')).toBe('/api/ataunit/1')
    expect(extractUrlPath(undefined)).toBe('')
  })
})

describe('formatAxiosError', () => {
  it('should fall back to the message of other errors', () => {
    expect(formatAxiosError(new Error('socket hang up'))).toBe('socket hang up')
    expect(formatAxiosError('plain failure')).toBe('plain failure')
  })
})
