/**
 * Scan Runner
 *
 * Runs every applicable scanner concurrently and collects their candidates.
 * One scanner failing, hanging past its timeout or returning garbage becomes
 * a ScanError for that source; the others are unaffected.
 */

import pLimit from 'p-limit'
import type { CandidateChange, Platform, ScanContext, Scanner, SystemInfo } from '../types.js'
import { defaultSystemInfo, toPlatform } from '../types.js'
import { ScanError } from './errors.js'
import { compareBySourceTitle } from './identity.js'
import { withAbort, withTimeout } from './timeout.js'

// =============================================================================
// Types
// =============================================================================

export interface ScanRunOptions {
  platform?: Platform
  systemInfo?: SystemInfo
  /** Timestamp stamped on every candidate (default: now) */
  observedAt?: string
  /** Max scanners in flight (0 = all) */
  concurrency?: number
  /** Per-scanner timeout in ms (0 = none) */
  timeoutMs?: number
  signal?: AbortSignal
  onProgress?: (completed: number, total: number, source: string) => void
}

export interface ScannerRun {
  source: string
  candidates?: CandidateChange[]
  error?: ScanError
  duration: number
}

export interface ScanRunResult {
  /** All candidates, sorted by source then title */
  candidates: CandidateChange[]
  /** One error per failed source, sorted by source */
  errors: ScanError[]
  /** Sources that scanned successfully, sorted */
  sources: string[]
  /** Per-scanner outcome, in input order */
  runs: ScannerRun[]
}

function validateCandidates(scanner: Scanner, output: unknown): CandidateChange[] {
  if (!Array.isArray(output)) {
    throw new ScanError(scanner.name, 'scanner did not return a list')
  }
  const candidates: CandidateChange[] = output
  for (const candidate of candidates) {
    if (!candidate.title || !candidate.title.trim()) {
      throw new ScanError(scanner.name, 'returned a candidate without a title')
    }
  }
  return candidates
}

// =============================================================================
// Runner
// =============================================================================

/**
 * Run scanners and aggregate their results
 *
 * Rejects with the abort reason when `signal` aborts; nothing is aggregated
 * in that case.
 */
export async function runScanners(
  scanners: readonly Scanner[],
  options: ScanRunOptions = {}
): Promise<ScanRunResult> {
  const platform = options.platform ?? toPlatform()
  const context: ScanContext = {
    platform,
    systemInfo: options.systemInfo ?? defaultSystemInfo(platform),
    observedAt: options.observedAt ?? new Date().toISOString(),
    signal: options.signal
  }
  const timeoutMs = options.timeoutMs ?? 0
  const concurrency = options.concurrency && options.concurrency > 0
    ? options.concurrency
    : Math.max(scanners.length, 1)

  options.signal?.throwIfAborted()

  const limit = pLimit(concurrency)
  let completed = 0

  const runOne = async (scanner: Scanner): Promise<ScannerRun> => {
    const startTime = Date.now()
    try {
      options.signal?.throwIfAborted()
      const output = await withTimeout(scanner.scan(context), timeoutMs, `scan ${scanner.name}`)
      const candidates = validateCandidates(scanner, output).map(candidate => ({
        ...candidate,
        source: scanner.name
      }))
      return { source: scanner.name, candidates, duration: Date.now() - startTime }
    } catch (err) {
      const error = err instanceof ScanError
        ? err
        : new ScanError(scanner.name, err instanceof Error ? err.message : String(err), err)
      return { source: scanner.name, error, duration: Date.now() - startTime }
    } finally {
      completed++
      options.onProgress?.(completed, scanners.length, scanner.name)
    }
  }

  const runs = await withAbort(
    Promise.all(scanners.map(scanner => limit(() => runOne(scanner)))),
    options.signal
  )
  options.signal?.throwIfAborted()

  const candidates: CandidateChange[] = []
  const errors: ScanError[] = []
  const sources: string[] = []

  for (const run of runs) {
    if (run.error) {
      errors.push(run.error)
    } else {
      sources.push(run.source)
      candidates.push(...(run.candidates ?? []))
    }
  }

  candidates.sort(compareBySourceTitle)
  errors.sort((a, b) => a.source.localeCompare(b.source))
  sources.sort()

  return { candidates, errors, sources, runs }
}
