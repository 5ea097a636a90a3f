import { AuthenticationError } from './errors.js'
import type { HttpResponse, HttpTransport } from './http.js'
import { formatAxiosError } from './http.js'
import createLogger from './logger.js'
import type { Credentials } from './session.js'
import { sleep } from './utils.js'

const logger = createLogger('auth')

const LOGIN_PATH = '/bff/login'
const LOGOUT_PATH = '/bff/logout'
const IDENTITY_PROVIDER_SUFFIX = 'amazoncognito.com'
const SESSION_SETTLE_MS = 3_000 // The web app needs a moment after the callback before the API accepts the session

const CSRF_PATTERNS = [/<input[^>]+name="_csrf"[^>]+value="([^"]+)"/i, /<input[^>]+value="([^"]+)"[^>]+name="_csrf"/i]
const ERROR_MESSAGE_REGEX = /<(?:p|div|span)[^>]+class="[^"]*error[^"]*"[^>]*>\s*([^<]+?)\s*</i

const encodeForm = (values: Record<string, string>): string => new URLSearchParams(values).toString()

export function extractCsrfToken(html: string): string | null {
  for (const pattern of CSRF_PATTERNS) {
    const match = html.match(pattern)
    if (match) {
      return match[1]
    }
  }
  return null
}

function isIdentityProviderLoginPage(url: URL): boolean {
  return url.hostname.endsWith(IDENTITY_PROVIDER_SUFFIX) && url.pathname.includes('/login')
}

function isAppHost(url: URL, appHost: string): boolean {
  return url.hostname === appHost || url.hostname.endsWith(`.${appHost}`)
}

export interface LoginFlowOptions {
  baseUrl: string
  settleMs?: number
}

/**
 * Hosted login: the web app redirects to the identity provider, which posts back to the app with a session cookie
 */
export class LoginFlow {
  private readonly http: HttpTransport
  private readonly baseUrl: string
  private readonly settleMs: number

  constructor(http: HttpTransport, options: LoginFlowOptions) {
    this.http = http
    this.baseUrl = options.baseUrl
    this.settleMs = options.settleMs ?? SESSION_SETTLE_MS
  }

  async login(credentials: Credentials): Promise<void> {
    this.http.clearCookies()
    try {
      const loginPage = await this.fetchLoginPage()
      const landing = await this.submitCredentials(loginPage, credentials)
      this.verifyLanding(landing)
    } catch (error) {
      this.http.clearCookies()
      if (error instanceof AuthenticationError) {
        throw error
      }
      throw new AuthenticationError(`Login failed: ${formatAxiosError(error)}`, { cause: error })
    }

    logger.info('Authenticated with MELCloud Home')
    if (this.settleMs > 0) {
      await sleep(this.settleMs)
    }
  }

  async logout(): Promise<void> {
    try {
      await this.http.request({ method: 'GET', url: `${this.baseUrl}${LOGOUT_PATH}` })
    } catch (error) {
      logger.debug(`Logout request failed: ${formatAxiosError(error)}`)
    } finally {
      this.http.clearCookies()
    }
  }

  // Follow the full redirect chain from the app to the identity provider's login form
  private async fetchLoginPage(): Promise<{ url: string; csrfToken: string }> {
    const response = await this.http.followRedirects({
      method: 'GET',
      url: `${this.baseUrl}${LOGIN_PATH}`,
      params: { returnUrl: '/dashboard' },
      headers: { Accept: 'text/html' },
    })

    logger.debug(`Login page resolved to status ${response.status} (${response.text.length} chars)`)

    if (response.status !== 200 || !isIdentityProviderLoginPage(new URL(response.resolvedUrl))) {
      throw new AuthenticationError(
        `Unexpected login page: HTTP ${response.status} at ${new URL(response.resolvedUrl).host}`,
      )
    }

    const csrfToken = extractCsrfToken(response.text)
    if (!csrfToken) {
      throw new AuthenticationError('Unable to extract the login form token')
    }

    return { url: response.resolvedUrl, csrfToken }
  }

  private async submitCredentials(
    loginPage: { url: string; csrfToken: string },
    credentials: Credentials,
  ): Promise<HttpResponse> {
    logger.debug('Submitting credentials')

    return this.http.followRedirects({
      method: 'POST',
      url: loginPage.url,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'text/html',
        Origin: new URL(loginPage.url).origin,
        Referer: loginPage.url,
      },
      body: encodeForm({
        _csrf: loginPage.csrfToken,
        username: credentials.email,
        password: credentials.password,
        cognitoAsfData: '',
      }),
    })
  }

  private verifyLanding(response: HttpResponse): void {
    const landing = new URL(response.resolvedUrl)
    const appHost = new URL(this.baseUrl).hostname
    const onErrorPage = landing.pathname.toLowerCase().includes('/error')

    if (isAppHost(landing, appHost) && !onErrorPage && response.status < 400) {
      return
    }

    if (onErrorPage || response.status >= 400) {
      const detail = response.text.match(ERROR_MESSAGE_REGEX)?.[1]
      throw new AuthenticationError(`Authentication failed: ${detail ?? `HTTP ${response.status}`}`)
    }

    if (landing.hostname.endsWith(IDENTITY_PROVIDER_SUFFIX)) {
      throw new AuthenticationError('Authentication failed: invalid email or password')
    }

    throw new AuthenticationError(`Authentication failed: unexpected redirect to ${landing.host}`)
  }
}
