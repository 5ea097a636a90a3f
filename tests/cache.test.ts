import { afterEach, describe, expect, it, vi } from 'vitest'
import { Cache } from '../src/cache.js'

vi.mock('../src/logger.js', () => ({
  default: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}))

describe('Cache', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should store and retrieve values', () => {
    const cache = new Cache<{ name: string }>()
    cache.set('test-key', { name: 'value' })
    expect(cache.get('test-key')).toEqual({ name: 'value' })
  })

  it('should return undefined for non-existent keys', () => {
    const cache = new Cache()
    expect(cache.get('non-existent')).toBeUndefined()
  })

  it('should generate consistent cache keys', () => {
    const cache = new Cache()
    expect(cache.cacheKey('unit-123').outdoorTemperature).toBe('unit-123:outdoor-temperature')
    expect(cache.cacheKey('unit-123').telemetry('flow_temperature')).toBe('unit-123:telemetry:flow_temperature')
  })

  it('should treat a stored null as present', () => {
    const cache = new Cache<number | null>()
    cache.set('key', null)

    expect(cache.has('key')).toBe(true)
    expect(cache.get('key')).toBeNull()
  })

  it('should check if key exists', () => {
    const cache = new Cache<number>()
    expect(cache.has('key')).toBe(false)

    cache.set('key', 1)
    expect(cache.has('key')).toBe(true)

    cache.delete('key')
    expect(cache.has('key')).toBe(false)
  })

  it('should expire entries after the TTL', () => {
    vi.useFakeTimers()
    const cache = new Cache<number>(10, 1000)
    cache.set('key', 5)

    vi.advanceTimersByTime(999)
    expect(cache.has('key')).toBe(true)

    vi.advanceTimersByTime(2)
    expect(cache.has('key')).toBe(false)
    expect(cache.get('key')).toBeUndefined()
  })

  it('should clear every entry', () => {
    const cache = new Cache<number>()
    cache.set('a', 1).set('b', 2)

    cache.clear()

    expect(cache.has('a')).toBe(false)
    expect(cache.has('b')).toBe(false)
  })

  it('should return cache instance for chaining', () => {
    const cache = new Cache<{ val: string }>()
    const result = cache.set('key1', { val: 'value1' })
    expect(result).toBe(cache)

    cache.set('key2', { val: 'value2' }).set('key3', { val: 'value3' })
    expect(cache.has('key2')).toBe(true)
    expect(cache.has('key3')).toBe(true)
  })
})
