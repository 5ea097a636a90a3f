import { LRU } from 'tiny-lru'
import createLogger from './logger.js'

const logger = createLogger('cache')

const maxItems = 1000
const defaultTtl = 1000 * 60 * 30 // 30 minutes
const defaultResetTtl = false

type CacheKeys = {
  outdoorTemperature: string
  telemetry: (measure: string) => string
}

export class Cache<T = unknown> {
  private readonly lru: LRU<T>

  constructor(max = maxItems, ttl = defaultTtl, resetTtl = defaultResetTtl) {
    this.lru = new LRU<T>(max, ttl, resetTtl)
  }

  cacheKey(key: string): CacheKeys {
    return {
      outdoorTemperature: `${key}:outdoor-temperature`,
      telemetry: (measure) => `${key}:telemetry:${measure}`,
    }
  }

  get(key: string): T | undefined {
    return this.lru.get(key)
  }

  set(key: string, value: T): this {
    this.lru.set(key, value)
    logger.debug(`Set "${key}" value:`, value)
    return this
  }

  /**
   * Goes through get so expired entries count as missing. Stored nulls count as present.
   */
  has(key: string): boolean {
    return this.lru.get(key) !== undefined
  }

  delete(key: string): this {
    this.lru.delete(key)
    return this
  }

  clear(): this {
    this.lru.clear()
    return this
  }
}
