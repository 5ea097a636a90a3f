/**
 * Serializes requests and keeps a minimum spacing between them.
 * MELCloud Home rate limits aggressively, bursts of writes trip it.
 */
export class RequestPacer {
  private readonly minIntervalMs: number
  private lastRequestTime = 0
  private queue: Promise<void> = Promise.resolve()

  constructor(minIntervalMs = 500) {
    this.minIntervalMs = minIntervalMs
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const task = this.queue.then(async () => {
      const elapsed = Date.now() - this.lastRequestTime
      if (elapsed < this.minIntervalMs) {
        await new Promise((resolve) => setTimeout(resolve, this.minIntervalMs - elapsed))
      }
      this.lastRequestTime = Date.now()
      return fn()
    })

    // Keep the chain alive after a failed request, the caller still sees the rejection
    this.queue = task.then(
      () => undefined,
      () => undefined,
    )

    return task
  }
}
