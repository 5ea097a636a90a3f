import { describe, expect, it } from 'vitest'
import { deepFreeze, formatApiDate, formatTelemetryDate, shortId } from '../src/utils.js'

describe('utils', () => {
  describe('shortId', () => {
    it('should keep the last 8 characters of long ids', () => {
      expect(shortId('0a1b2c3d-4e5f-6789-abcd-ef0123456789')).toBe('23456789')
    })

    it('should leave short ids untouched', () => {
      expect(shortId('atw-0001')).toBe('atw-0001')
    })
  })

  describe('deepFreeze', () => {
    it('should freeze nested objects and arrays', () => {
      const building = deepFreeze({ name: 'Home', units: [{ zone1: { setTemperature: 21 } }] })

      expect(Object.isFrozen(building)).toBe(true)
      expect(Object.isFrozen(building.units)).toBe(true)
      expect(Object.isFrozen(building.units[0]?.zone1)).toBe(true)
    })

    it('should pass primitives and null through', () => {
      expect(deepFreeze(5)).toBe(5)
      expect(deepFreeze(null)).toBeNull()
    })
  })

  describe('formatApiDate', () => {
    it('should use seven fractional digits without a zone suffix', () => {
      expect(formatApiDate(new Date('2026-01-31T12:34:56.789Z'))).toBe('2026-01-31T12:34:56.0000000')
    })
  })

  describe('formatTelemetryDate', () => {
    it('should use UTC minutes separated by a space', () => {
      expect(formatTelemetryDate(new Date('2026-01-14T16:05:59.999Z'))).toBe('2026-01-14 16:05')
    })
  })
})
