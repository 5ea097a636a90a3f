import { describe, expect, it } from 'vitest'
import { formatStateDifferences, getStateDifferences } from '../src/state-differences.js'

const unit = {
  id: 'atw-0001',
  power: true,
  rssi: -60,
  zone1: { setTemperature: 21, roomTemperature: 19.5 },
  zone2: null as { setTemperature: number } | null,
  tank: { setTemperature: 50, temperature: 48 },
}

describe('State Differences', () => {
  describe('getStateDifferences', () => {
    it('should detect changes in top-level properties', () => {
      const differences = getStateDifferences(unit, { ...unit, power: false, rssi: -70 })

      expect(differences).toEqual({
        power: { from: true, to: false },
        rssi: { from: -60, to: -70 },
      })
    })

    it('should flatten nested changes into dotted paths', () => {
      const differences = getStateDifferences(unit, { ...unit, zone1: { setTemperature: 22, roomTemperature: 19.5 } })

      expect(differences).toEqual({ 'zone1.setTemperature': { from: 21, to: 22 } })
    })

    it('should report a nested object that appears as one change', () => {
      const differences = getStateDifferences(unit, { ...unit, zone2: { setTemperature: 20 } })

      expect(differences).toEqual({ zone2: { from: null, to: { setTemperature: 20 } } })
    })

    it('should skip ignored keys and everything below them', () => {
      const differences = getStateDifferences(
        unit,
        { ...unit, rssi: -80, tank: { setTemperature: 55, temperature: 49 }, power: false },
        ['rssi', 'tank'],
      )

      expect(differences).toEqual({ power: { from: true, to: false } })
    })

    it('should skip an ignored nested path only', () => {
      const differences = getStateDifferences(
        unit,
        { ...unit, tank: { setTemperature: 55, temperature: 49 } },
        ['tank.temperature'],
      )

      expect(differences).toEqual({ 'tank.setTemperature': { from: 50, to: 55 } })
    })

    it('should return nothing without a previous state', () => {
      expect(getStateDifferences(null, unit)).toEqual({})
    })

    it('should return nothing for equal states', () => {
      expect(getStateDifferences(unit, structuredClone(unit))).toEqual({})
    })
  })

  describe('formatStateDifferences', () => {
    it('should render one indented line per change', () => {
      const formatted = formatStateDifferences({
        power: { from: true, to: false },
        'zone1.setTemperature': { from: 21, to: 22 },
      })

      expect(formatted).toBe('\n  power: true → false\n  zone1.setTemperature: 21 → 22')
    })
  })
})
