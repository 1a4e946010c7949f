/**
 * Shared fixtures: fake scanners and temp vault roots
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { CandidateChange, EntryKind, ScanContext, Scanner } from '../src/types.js'

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `setupvault-${prefix}-`))
}

export function makeCandidate(source: string, title: string, overrides: Partial<CandidateChange> = {}): CandidateChange {
  return {
    source,
    title,
    entryKind: 'package',
    command: `install ${title}`,
    systemInfo: { os: 'macos', arch: 'arm64' },
    observedAt: '2024-05-01T10:00:00.000Z',
    ...overrides
  }
}

interface FakeScannerOptions {
  entryKind?: EntryKind
  delayMs?: number
  platforms?: Scanner['platforms']
}

/**
 * Scanner reporting a mutable list of titles, so tests can change what the
 * "machine" has between runs
 */
export function fakeScanner(
  name: string,
  titles: string[],
  options: FakeScannerOptions = {}
): Scanner & { titles: string[]; calls: number } {
  return {
    name,
    platforms: options.platforms,
    titles,
    calls: 0,
    async scan(context: ScanContext) {
      this.calls++
      if (options.delayMs) {
        await new Promise(resolve => setTimeout(resolve, options.delayMs))
      }
      return this.titles.map(title => ({
        source: name,
        title,
        entryKind: options.entryKind ?? 'package',
        command: `${name} install ${title}`,
        systemInfo: context.systemInfo,
        observedAt: context.observedAt
      }))
    }
  }
}

export function failingScanner(name: string, message: string = 'tool crashed'): Scanner {
  return {
    name,
    async scan() {
      throw new Error(message)
    }
  }
}

export function hangingScanner(name: string): Scanner {
  return {
    name,
    scan: () => new Promise<CandidateChange[]>(() => {})
  }
}
