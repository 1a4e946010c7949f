/**
 * Differ
 *
 * Decides which candidates of a scan run are genuinely new. A key is new
 * only if it is absent from its source's last snapshot and from the live
 * identity index (Inbox, Snoozed, Library and ignore tombstones).
 * Additive only: a source that stops reporting an item never removes it.
 */

import type { CandidateChange } from '../types.js'
import { identityKey } from './identity.js'

export interface DiffInput {
  candidates: readonly CandidateChange[]
  /** Sources that scanned successfully; defaults to the candidates' sources */
  scannedSources?: readonly string[]
  /** Keys stored in the last snapshot of a source */
  snapshotKeys: (source: string) => readonly string[]
  liveKeys: ReadonlySet<string>
}

export interface DiffResult {
  /** Candidates to append to the Inbox, in input order */
  fresh: CandidateChange[]
  /** Full current key set per scanned source, to persist as its snapshot */
  snapshots: Map<string, string[]>
  /** Candidates discarded as already seen or duplicated within the run */
  discarded: number
}

export function diffCandidates(input: DiffInput): DiffResult {
  const sources = input.scannedSources
    ? [...new Set(input.scannedSources)]
    : [...new Set(input.candidates.map(candidate => candidate.source))]

  const current = new Map<string, Set<string>>()
  for (const source of sources) {
    current.set(source, new Set())
  }

  const previous = new Map<string, Set<string>>()
  const seenThisRun = new Set<string>()
  const fresh: CandidateChange[] = []
  let discarded = 0

  for (const candidate of input.candidates) {
    const keys = current.get(candidate.source)
    if (!keys) {
      // Source did not scan successfully
      discarded++
      continue
    }

    const key = identityKey(candidate.source, candidate.title)
    keys.add(key)

    let snapshot = previous.get(candidate.source)
    if (!snapshot) {
      snapshot = new Set(input.snapshotKeys(candidate.source))
      previous.set(candidate.source, snapshot)
    }

    if (seenThisRun.has(key) || snapshot.has(key) || input.liveKeys.has(key)) {
      discarded++
      continue
    }

    seenThisRun.add(key)
    fresh.push(candidate)
  }

  const snapshots = new Map<string, string[]>()
  for (const [source, keys] of current) {
    snapshots.set(source, [...keys].sort())
  }

  return { fresh, snapshots, discarded }
}
