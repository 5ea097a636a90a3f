import { describe, expect, it } from 'vitest'
import createLogger, { stringifyArgs } from '../src/logger.js'

describe('logger', () => {
  describe('stringifyArgs', () => {
    it('should join primitives with spaces', () => {
      expect(stringifyArgs(['Poll failed', 3, true, null, undefined], false)).toBe('Poll failed 3 true null undefined')
    })

    it('should inspect objects on one line', () => {
      expect(stringifyArgs(['Set "key" value:', { zone: 1, temps: [21, 22] }], false)).toBe(
        'Set "key" value: { zone: 1, temps: [ 21, 22 ] }',
      )
    })
  })

  describe('createLogger', () => {
    it('should expose the four levels', () => {
      const logger = createLogger('test')

      expect(typeof logger.info).toBe('function')
      expect(typeof logger.warn).toBe('function')
      expect(typeof logger.error).toBe('function')
      expect(typeof logger.debug).toBe('function')
    })
  })
})
