export type Cancel = () => void

/**
 * Periodic task plus a cancellable delayed callback, supplied by the host
 */
export interface Scheduler {
  every(ms: number, task: () => void): Cancel
  after(ms: number, task: () => void): Cancel
}

/**
 * Default scheduler on Node timers. Every pending timer is tracked so `cancelAll` leaves nothing behind.
 */
export class TimerScheduler implements Scheduler {
  private readonly intervals = new Set<NodeJS.Timeout>()
  private readonly timeouts = new Set<NodeJS.Timeout>()

  every(ms: number, task: () => void): Cancel {
    const handle = setInterval(task, ms)
    this.intervals.add(handle)
    return () => {
      clearInterval(handle)
      this.intervals.delete(handle)
    }
  }

  after(ms: number, task: () => void): Cancel {
    const handle = setTimeout(() => {
      this.timeouts.delete(handle)
      task()
    }, ms)
    this.timeouts.add(handle)
    return () => {
      clearTimeout(handle)
      this.timeouts.delete(handle)
    }
  }

  get pending(): number {
    return this.intervals.size + this.timeouts.size
  }

  cancelAll(): void {
    for (const handle of this.intervals) {
      clearInterval(handle)
    }
    for (const handle of this.timeouts) {
      clearTimeout(handle)
    }
    this.intervals.clear()
    this.timeouts.clear()
  }
}
