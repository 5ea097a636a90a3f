import type { HttpResponse, HttpTransport, RequestOptions } from '../../src/http.js'

type Responder = (request: RequestOptions) => Partial<HttpResponse> | Error

/**
 * In-process stand-in for the HTTP transport.
 * Routes are matched on "METHOD path", unmatched requests answer 404.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: RequestOptions[] = []
  readonly redirectRequests: RequestOptions[] = []
  cookiesCleared = 0
  private readonly routes = new Map<string, Responder[]>()

  /**
   * Queue a response for a route. The last queued response keeps answering once the others are used.
   */
  on(method: string, path: string, response: Partial<HttpResponse> | Error | Responder): this {
    const key = `${method} ${path}`
    const responder: Responder = typeof response === 'function' ? response : () => response
    const queue = this.routes.get(key) ?? []
    queue.push(responder)
    this.routes.set(key, queue)
    return this
  }

  count(method: string, path: string): number {
    return this.requests.filter((request) => request.method === method && new URL(request.url).pathname === path)
      .length
  }

  async request(options: RequestOptions): Promise<HttpResponse> {
    this.requests.push(options)
    return this.respond(options)
  }

  async followRedirects(options: RequestOptions): Promise<HttpResponse> {
    this.redirectRequests.push(options)
    return this.respond(options)
  }

  clearCookies(): void {
    this.cookiesCleared++
  }

  private respond(options: RequestOptions): HttpResponse {
    const path = new URL(options.url).pathname
    const queue = this.routes.get(`${options.method} ${path}`)
    const responder = queue && queue.length > 1 ? queue.shift() : queue?.[0]
    const result = responder ? responder(options) : { status: 404, text: '' }
    if (result instanceof Error) {
      throw result
    }
    return {
      status: result.status ?? 200,
      headers: result.headers ?? {},
      text: result.text ?? '',
      resolvedUrl: result.resolvedUrl ?? options.url,
    }
  }
}
