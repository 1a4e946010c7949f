/**
 * Tests for CLI argument helpers
 */

import { describe, it, expect } from 'vitest'
import {
  parseEntryKind,
  parseRecordStatus,
  parseTagsOption,
  requireArg
} from '../../src/cli/commands/shared.js'
import { ValidationError } from '../../src/lib/errors.js'

describe('requireArg', () => {
  it('should return the trimmed positional value', () => {
    expect(requireArg({ _: ['show', ' id-1 '] }, 1, 'id', 'setupvault show <id>')).toBe('id-1')
  })

  it('should throw with usage as the suggestion when missing', () => {
    let thrown: unknown
    try {
      requireArg({ _: ['show'] }, 1, 'id', 'setupvault show <id>')
    } catch (err) {
      thrown = err
    }
    expect(thrown).toBeInstanceOf(ValidationError)
    expect(thrown).toMatchObject({
      message: 'Missing required argument: id',
      suggestion: 'Usage: setupvault show <id>'
    })
  })
})

describe('parseEntryKind', () => {
  it('should accept known kinds in any case', () => {
    expect(parseEntryKind(' Application ')).toBe('application')
    expect(parseEntryKind(undefined)).toBeUndefined()
  })

  it('should reject unknown kinds', () => {
    expect(() => parseEntryKind('plugin')).toThrow('Unknown entry kind: plugin')
  })
})

describe('parseRecordStatus', () => {
  it('should accept active and ignored', () => {
    expect(parseRecordStatus('ACTIVE')).toBe('active')
    expect(parseRecordStatus('ignored')).toBe('ignored')
  })

  it('should reject anything else', () => {
    expect(() => parseRecordStatus('archived')).toThrow(ValidationError)
  })
})

describe('parseTagsOption', () => {
  it('should split, normalize and sort tags', () => {
    expect(parseTagsOption('Work, cli,,work')).toEqual(['cli', 'work'])
    expect(parseTagsOption(undefined)).toBeUndefined()
  })
})
