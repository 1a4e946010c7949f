/**
 * Tests for differ.ts
 */

import { describe, it, expect } from 'vitest'
import { diffCandidates } from '../../src/lib/differ.js'
import { makeCandidate } from '../helpers.js'

const noSnapshot = () => []

describe('diffCandidates', () => {
  it('should treat everything as fresh for a first scan', () => {
    const result = diffCandidates({
      candidates: [makeCandidate('homebrew', 'jq'), makeCandidate('homebrew', 'wget')],
      snapshotKeys: noSnapshot,
      liveKeys: new Set()
    })
    expect(result.fresh.map(c => c.title)).toEqual(['jq', 'wget'])
    expect(result.discarded).toBe(0)
    expect(result.snapshots).toEqual(new Map([['homebrew', ['homebrew:jq', 'homebrew:wget']]]))
  })

  it('should drop keys present in the source snapshot', () => {
    const result = diffCandidates({
      candidates: [makeCandidate('homebrew', 'jq'), makeCandidate('homebrew', 'wget')],
      snapshotKeys: source => (source === 'homebrew' ? ['homebrew:jq'] : []),
      liveKeys: new Set()
    })
    expect(result.fresh.map(c => c.title)).toEqual(['wget'])
    expect(result.discarded).toBe(1)
  })

  it('should drop live keys even without a snapshot', () => {
    const result = diffCandidates({
      candidates: [makeCandidate('homebrew', 'JQ'), makeCandidate('npm', 'typescript')],
      snapshotKeys: noSnapshot,
      liveKeys: new Set(['homebrew:jq'])
    })
    expect(result.fresh.map(c => c.title)).toEqual(['typescript'])
  })

  it('should keep only the first of duplicates within one run', () => {
    const first = makeCandidate('homebrew', 'jq', { command: 'first' })
    const result = diffCandidates({
      candidates: [first, makeCandidate('homebrew', ' jq ', { command: 'second' })],
      snapshotKeys: noSnapshot,
      liveKeys: new Set()
    })
    expect(result.fresh).toEqual([first])
    expect(result.discarded).toBe(1)
    expect(result.snapshots.get('homebrew')).toEqual(['homebrew:jq'])
  })

  it('should ignore candidates from sources that did not scan', () => {
    const result = diffCandidates({
      candidates: [makeCandidate('homebrew', 'jq'), makeCandidate('npm', 'typescript')],
      scannedSources: ['homebrew'],
      snapshotKeys: noSnapshot,
      liveKeys: new Set()
    })
    expect(result.fresh.map(c => c.source)).toEqual(['homebrew'])
    expect([...result.snapshots.keys()]).toEqual(['homebrew'])
    expect(result.discarded).toBe(1)
  })

  it('should produce an empty snapshot for a scanned source with no results', () => {
    const result = diffCandidates({
      candidates: [],
      scannedSources: ['homebrew'],
      snapshotKeys: () => ['homebrew:jq'],
      liveKeys: new Set()
    })
    expect(result.fresh).toEqual([])
    expect(result.snapshots.get('homebrew')).toEqual([])
  })

  it('should include already-seen keys in the new snapshot', () => {
    const result = diffCandidates({
      candidates: [makeCandidate('homebrew', 'jq'), makeCandidate('homebrew', 'wget')],
      snapshotKeys: () => ['homebrew:jq', 'homebrew:curl'],
      liveKeys: new Set()
    })
    expect(result.snapshots.get('homebrew')).toEqual(['homebrew:jq', 'homebrew:wget'])
  })
})
