/**
 * Tests for health.ts
 */

import { describe, it, expect } from 'vitest'
import { calculateHealth, calculateStats, formatHealth } from '../../src/lib/health.js'

describe('calculateHealth', () => {
  it('should be 100 for an empty vault', () => {
    expect(calculateHealth(0, 0)).toBe(100)
  })

  it('should be the reviewed share as a percentage', () => {
    expect(calculateHealth(1, 0)).toBe(100)
    expect(calculateHealth(0, 3)).toBe(0)
    expect(calculateHealth(1, 1)).toBe(50)
    expect(calculateHealth(3, 1)).toBe(75)
  })

  it('should stay within [0, 100]', () => {
    for (const [library, inbox] of [[0, 1], [5, 7], [100, 1], [1, 100]]) {
      const health = calculateHealth(library, inbox)
      expect(health).toBeGreaterThanOrEqual(0)
      expect(health).toBeLessThanOrEqual(100)
    }
  })
})

describe('calculateStats', () => {
  it('should count only active records toward health', () => {
    const stats = calculateStats({ inbox: 1, snoozed: 4, active: 1, ignored: 2 })
    expect(stats).toEqual({
      inbox: 1,
      snoozed: 4,
      active: 1,
      ignored: 2,
      library: 3,
      health: 50
    })
  })
})

describe('formatHealth', () => {
  it('should round to a whole percentage', () => {
    expect(formatHealth(100)).toBe('100%')
    expect(formatHealth(200 / 3)).toBe('67%')
  })
})
