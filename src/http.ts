import axios, { type AxiosInstance } from 'axios'
import { BASE_URL, USER_AGENT } from './constants.js'
import createLogger from './logger.js'
import { RequestPacer } from './pacer.js'

const logger = createLogger('http')

const API_TIMEOUT_MS = 30_000 // Default timeout for requests
const MAX_REDIRECTS = 10 // Login bounces through the identity provider a few times
const ERROR_RESPONSE_MAX_LENGTH = 200 // Max length of error response to include in logs

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export interface RequestOptions {
  method: HttpMethod
  url: string
  headers?: Record<string, string>
  params?: Record<string, string>
  body?: string
}

export interface HttpResponse {
  status: number
  headers: Record<string, string>
  text: string
  // Absolute URL of the last hop when redirects were followed
  resolvedUrl: string
}

/**
 * What the control client needs from the transport
 */
export interface HttpTransport {
  request(options: RequestOptions): Promise<HttpResponse>
  followRedirects(options: RequestOptions, maxRedirects?: number): Promise<HttpResponse>
  clearCookies(): void
}

export interface HttpClientOptions {
  baseUrl?: string
  requestSpacingMs?: number
  timeoutMs?: number
  userAgent?: string
}

// Helper to extract URL path from absolute or relative URLs
export function extractUrlPath(url: string | undefined): string {
  if (!url) return ''

  try {
    return new URL(url).pathname
  } catch {
    // If url is a relative path, use it directly
    return url.split('?')[0]
  }
}

export function formatAxiosError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status
    const statusText = error.response?.statusText
    const method = error.config?.method?.toUpperCase()
    const url = error.config?.url
    const code = error.code

    let formatted = error.message
    if (code && !formatted.includes(code)) {
      formatted += ` (${code})`
    }
    if (status) {
      const statusPart = statusText ? ` ${statusText}` : ''
      formatted += ` (${status}${statusPart})`
    }
    if (method && url) {
      formatted += ` [${method} ${extractUrlPath(url)}]`
    }

    // Add response data if available and not too large
    if (typeof error.response?.data === 'string' && error.response.data.length < ERROR_RESPONSE_MAX_LENGTH) {
      formatted += ` - ${error.response.data}`
    }

    return formatted
  }
  return error instanceof Error ? error.message : String(error)
}

/**
 * Cookie-session HTTP client on top of axios.
 * Redirects are handled here rather than by axios so every hop's cookies land in the jar.
 */
export class HttpClient implements HttpTransport {
  private readonly client: AxiosInstance
  private readonly pacer: RequestPacer
  private readonly cookieJar = new Map<string, string>()
  readonly baseUrl: string

  constructor(options: HttpClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? BASE_URL
    this.pacer = new RequestPacer(options.requestSpacingMs)
    this.client = axios.create({
      timeout: options.timeoutMs ?? API_TIMEOUT_MS,
      maxRedirects: 0,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
      headers: {
        'User-Agent': options.userAgent ?? USER_AGENT,
      },
    })
  }

  get cookieCount(): number {
    return this.cookieJar.size
  }

  clearCookies(): void {
    this.cookieJar.clear()
  }

  async request(options: RequestOptions): Promise<HttpResponse> {
    const url = this.resolveUrl(options.url)

    return this.pacer.run(async () => {
      const headers: Record<string, string> = { ...options.headers }
      const cookieHeader = this.buildCookieHeader()
      if (cookieHeader) {
        headers.Cookie = cookieHeader
      }

      logger.debug(`${options.method} ${extractUrlPath(url)}`)
      const response = await this.client.request<unknown>({
        method: options.method,
        url,
        headers,
        params: options.params,
        data: options.body,
      })

      this.captureCookies(response.headers['set-cookie'])

      const responseHeaders: Record<string, string> = {}
      for (const [key, value] of Object.entries(response.headers)) {
        if (typeof value === 'string' || typeof value === 'number') {
          responseHeaders[key.toLowerCase()] = String(value)
        }
      }

      return {
        status: response.status,
        headers: responseHeaders,
        text: typeof response.data === 'string' ? response.data : '',
        resolvedUrl: url,
      }
    })
  }

  async followRedirects(options: RequestOptions, maxRedirects = MAX_REDIRECTS): Promise<HttpResponse> {
    let currentUrl = this.resolveUrl(options.url)
    let currentMethod = options.method

    for (let i = 0; i < maxRedirects; i++) {
      const response = await this.request({
        ...options,
        method: currentMethod,
        url: currentUrl,
        // Query params only belong to the first hop, later hops carry theirs in the Location
        params: i === 0 ? options.params : undefined,
        body: currentMethod === 'GET' ? undefined : options.body,
      })

      const location = response.headers.location
      if (response.status >= 300 && response.status < 400 && location) {
        currentUrl = new URL(location, currentUrl).toString()
        currentMethod = 'GET'
        continue
      }

      return response
    }

    throw new Error(`Too many redirects (max ${maxRedirects})`)
  }

  private resolveUrl(url: string): string {
    return new URL(url, this.baseUrl).toString()
  }

  private captureCookies(cookies: string[] | undefined): void {
    if (!cookies) {
      return
    }

    for (const cookie of cookies) {
      const [nameValue = '', ...attributes] = cookie.split(';')
      const equalsIndex = nameValue.indexOf('=')
      if (equalsIndex === -1) {
        continue
      }
      const name = nameValue.slice(0, equalsIndex).trim()
      const value = nameValue.slice(equalsIndex + 1).trim()
      if (!name) {
        continue
      }

      const expired = attributes.some((attribute) => attribute.trim().toLowerCase() === 'max-age=0')
      if (expired || value === '') {
        this.cookieJar.delete(name)
      } else {
        this.cookieJar.set(name, value)
      }
    }
  }

  private buildCookieHeader(): string {
    return [...this.cookieJar.entries()].map(([name, value]) => `${name}=${value}`).join('; ')
  }
}
