/**
 * SetupVault Lifecycle Controller
 *
 * Owns the Inbox, Snoozed and Library collections and every transition
 * between them:
 *
 *   Inbox   -> Library (accept) | Snoozed (snooze) | removed (ignore)
 *   Snoozed -> Inbox (unsnooze) | removed
 *   Library active <-> ignored, Library -> removed
 *
 * Each operation runs under a single in-process lock. Files are written
 * first; in-memory state changes only after every write succeeded, and a
 * multi-file operation undoes its earlier writes when a later one fails.
 */

import { randomUUID } from 'node:crypto'
import pLimit from 'p-limit'
import { defaultSystemInfo } from '../types.js'
import type {
  CandidateChange,
  EntryKind,
  RecordStatus,
  SystemInfo,
  TrackedChange,
  VaultRecord
} from '../types.js'
import { diffCandidates } from '../lib/differ.js'
import {
  CorruptRecordError,
  DuplicateIdentityError,
  MissingRationaleError,
  NotFoundError,
  ValidationError
} from '../lib/errors.js'
import { compareBySourceTitle, identityKey, normalizeTags } from '../lib/identity.js'
import type { RecordStore, StoredRecord } from '../lib/record-store.js'
import { findSectionHeading } from '../lib/record-store.js'
import type { SecretWarning } from '../lib/secret-patterns.js'
import { checkFileForSecrets } from '../lib/secret-patterns.js'

// =============================================================================
// Types
// =============================================================================

export interface AcceptInput {
  rationale: string
  tags?: string[]
  verification?: string
}

export interface AcceptResult {
  id: string
  record: VaultRecord
  filePath: string
  /** Advisory only; the record is written regardless */
  warnings: SecretWarning[]
}

export interface EditRecordInput {
  tags?: string[]
  verification?: string
}

export interface CaptureInput {
  title: string
  rationale: string
  entryKind?: EntryKind
  source?: string
  command?: string
  tags?: string[]
  verification?: string
  systemInfo?: SystemInfo
}

export interface IngestResult {
  /** Items appended to the Inbox */
  ingested: TrackedChange[]
  /** Sources whose snapshot was rewritten */
  snapshots: string[]
  discarded: number
}

export interface LifecycleOptions {
  verbose?: boolean
  /** Id generator (default: random UUID) */
  generateId?: () => string
  now?: () => Date
}

// =============================================================================
// Helpers
// =============================================================================

function cloneChange(change: TrackedChange): TrackedChange {
  return structuredClone(change)
}

function cloneRecord(record: VaultRecord): VaultRecord {
  return structuredClone(record)
}

function rejectSectionHeadings(field: string, text: string): void {
  const heading = findSectionHeading(text)
  if (heading !== undefined) {
    throw new ValidationError(`The ${field} cannot contain a "${heading}" line`, 'INVALID_INPUT', {
      suggestion: 'Use a lower-level heading such as "## Steps" instead',
      context: { field, heading }
    })
  }
}

function requireRationale(rationale: string | undefined, id?: string): string {
  const trimmed = rationale?.trim() ?? ''
  if (!trimmed) {
    throw new MissingRationaleError(id)
  }
  rejectSectionHeadings('rationale', trimmed)
  return trimmed
}

function optionalVerification(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  if (!trimmed) return undefined
  rejectSectionHeadings('verification', trimmed)
  return trimmed
}

function withVerification(record: VaultRecord, verification: string | undefined): VaultRecord {
  const next: VaultRecord = { ...record, tags: [...record.tags] }
  delete next.verification
  if (verification !== undefined) {
    next.verification = verification
  }
  return next
}

// =============================================================================
// Controller
// =============================================================================

export class LifecycleController {
  private inbox: TrackedChange[]
  private snoozed: TrackedChange[]
  private readonly library: Map<string, StoredRecord>
  private ignored: Set<string>
  private readonly lock = pLimit(1)
  private readonly verbose: boolean
  private readonly generateId: () => string
  private readonly now: () => Date

  /** Record files that could not be read when the vault was opened */
  readonly loadErrors: CorruptRecordError[]

  private constructor(
    private readonly store: RecordStore,
    state: {
      inbox: TrackedChange[]
      snoozed: TrackedChange[]
      library: StoredRecord[]
      ignored: string[]
      loadErrors: CorruptRecordError[]
    },
    options: LifecycleOptions
  ) {
    this.verbose = options.verbose ?? false
    this.generateId = options.generateId ?? randomUUID
    this.now = options.now ?? (() => new Date())
    this.library = new Map(state.library.map(stored => [stored.record.id, stored]))
    this.ignored = new Set(state.ignored)
    this.loadErrors = state.loadErrors

    // An interrupted transition can leave an id in two places; the later
    // location of each transition wins.
    const snoozedIds = new Set(state.snoozed.map(change => change.id))
    this.snoozed = state.snoozed.filter(change => !this.library.has(change.id))
    this.inbox = state.inbox.filter(change => !this.library.has(change.id) && !snoozedIds.has(change.id))
  }

  /**
   * Load the queues, tombstones and library of an initialized vault
   */
  static async open(store: RecordStore, options: LifecycleOptions = {}): Promise<LifecycleController> {
    store.ensureInitialized()
    const { records, errors } = await store.listRecords()
    const controller = new LifecycleController(
      store,
      {
        inbox: store.readQueue('inbox'),
        snoozed: store.readQueue('snoozed'),
        library: records,
        ignored: store.readIgnored(),
        loadErrors: errors
      },
      options
    )
    for (const error of errors) {
      controller.log(`skipping ${error.path}: ${error.reason}`)
    }
    return controller
  }

  private log(message: string): void {
    if (this.verbose) {
      console.error(`[setupvault] ${message}`)
    }
  }

  /**
   * Undo an earlier write after a later one failed. The original failure is
   * what propagates; an undo failure is reported alongside it.
   */
  private rollback(description: string, undo: () => void): void {
    try {
      undo()
    } catch (undoError) {
      console.error(`[setupvault] rollback of ${description} failed: ${String(undoError)}`)
    }
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  getInbox(): TrackedChange[] {
    return this.inbox.map(cloneChange)
  }

  getSnoozed(): TrackedChange[] {
    return this.snoozed.map(cloneChange)
  }

  getLibrary(): VaultRecord[] {
    return [...this.library.values()]
      .map(stored => cloneRecord(stored.record))
      .sort(compareBySourceTitle)
  }

  getRecordEntry(id: string): StoredRecord | undefined {
    const stored = this.library.get(id)
    return stored ? { record: cloneRecord(stored.record), filePath: stored.filePath } : undefined
  }

  getIgnoredKeys(): string[] {
    return [...this.ignored].sort()
  }

  /**
   * Identity keys that block re-entry into the Inbox
   */
  liveKeys(): Set<string> {
    const keys = new Set(this.ignored)
    for (const change of this.inbox) keys.add(identityKey(change.source, change.title))
    for (const change of this.snoozed) keys.add(identityKey(change.source, change.title))
    for (const { record } of this.library.values()) keys.add(identityKey(record.source, record.title))
    return keys
  }

  // ---------------------------------------------------------------------------
  // Ingestion
  // ---------------------------------------------------------------------------

  private track(candidate: CandidateChange): TrackedChange {
    const change: TrackedChange = {
      id: this.generateId(),
      state: 'inbox',
      source: candidate.source,
      title: candidate.title.trim(),
      entryKind: candidate.entryKind,
      command: candidate.command,
      systemInfo: { ...candidate.systemInfo },
      observedAt: candidate.observedAt
    }
    if (candidate.path !== undefined) change.path = candidate.path
    if (candidate.tags && candidate.tags.length > 0) change.tags = normalizeTags(candidate.tags)
    return change
  }

  /**
   * Add one candidate to the Inbox
   */
  ingest(candidate: CandidateChange): Promise<TrackedChange> {
    return this.lock(() => {
      const key = identityKey(candidate.source, candidate.title)
      if (this.liveKeys().has(key)) {
        throw new DuplicateIdentityError(key)
      }

      const change = this.track(candidate)
      const nextInbox = [...this.inbox, change]
      this.store.writeQueue('inbox', nextInbox)
      this.inbox = nextInbox
      this.log(`ingested ${key} as ${change.id}`)
      return cloneChange(change)
    })
  }

  /**
   * Diff a scan run against snapshots and the live index, append what is
   * new to the Inbox, then rewrite each scanned source's snapshot
   */
  ingestScan(
    candidates: readonly CandidateChange[],
    scannedSources?: readonly string[]
  ): Promise<IngestResult> {
    return this.lock(() => {
      const diff = diffCandidates({
        candidates,
        scannedSources,
        snapshotKeys: source => this.store.snapshots.load(source).keys,
        liveKeys: this.liveKeys()
      })

      const ingested = diff.fresh.map(candidate => this.track(candidate))
      if (ingested.length > 0) {
        const nextInbox = [...this.inbox, ...ingested]
        this.store.writeQueue('inbox', nextInbox)
        this.inbox = nextInbox
      }

      const updatedAt = this.now().toISOString()
      for (const [source, keys] of diff.snapshots) {
        this.store.snapshots.save(source, keys, updatedAt)
      }

      this.log(`ingested ${ingested.length} new change(s), discarded ${diff.discarded}`)
      return {
        ingested: ingested.map(cloneChange),
        snapshots: [...diff.snapshots.keys()].sort(),
        discarded: diff.discarded
      }
    })
  }

  // ---------------------------------------------------------------------------
  // Inbox transitions
  // ---------------------------------------------------------------------------

  /**
   * Promote an Inbox item to an active Record with the same id
   */
  accept(id: string, input: AcceptInput): Promise<AcceptResult> {
    return this.lock(() => {
      const rationale = requireRationale(input.rationale, id)
      const change = this.inbox.find(item => item.id === id)
      if (!change) {
        throw new NotFoundError(id, 'inbox')
      }

      const record: VaultRecord = {
        id: change.id,
        title: change.title,
        entryKind: change.entryKind,
        source: change.source,
        command: change.command,
        systemInfo: { ...change.systemInfo },
        detectedAt: change.observedAt,
        status: 'active',
        tags: normalizeTags([...(change.tags ?? []), ...(input.tags ?? [])]),
        rationale
      }
      const verification = optionalVerification(input.verification)
      if (verification !== undefined) record.verification = verification

      const filePath = this.store.writeRecord(record)
      const nextInbox = this.inbox.filter(item => item.id !== id)
      try {
        this.store.writeQueue('inbox', nextInbox)
      } catch (err) {
        this.rollback(`record ${id}`, () => this.store.deleteRecordFile(filePath))
        throw err
      }

      this.inbox = nextInbox
      this.library.set(id, { record, filePath })
      this.log(`accepted ${id} into ${filePath}`)

      const warnings: SecretWarning[] = []
      if (change.path) {
        const warning = checkFileForSecrets(change.path)
        if (warning) warnings.push(warning)
      }

      return { id, record: cloneRecord(record), filePath, warnings }
    })
  }

  /**
   * Move an Inbox item to Snoozed, unchanged apart from its state
   */
  snooze(id: string): Promise<TrackedChange> {
    return this.lock(() => {
      const change = this.inbox.find(item => item.id === id)
      if (!change) {
        throw new NotFoundError(id, 'inbox')
      }

      const moved: TrackedChange = { ...cloneChange(change), state: 'snoozed' }
      const previousSnoozed = this.snoozed
      const nextSnoozed = [...previousSnoozed, moved]
      const nextInbox = this.inbox.filter(item => item.id !== id)

      this.store.writeQueue('snoozed', nextSnoozed)
      try {
        this.store.writeQueue('inbox', nextInbox)
      } catch (err) {
        this.rollback('snoozed queue', () => this.store.writeQueue('snoozed', previousSnoozed))
        throw err
      }

      this.snoozed = nextSnoozed
      this.inbox = nextInbox
      this.log(`snoozed ${id}`)
      return cloneChange(moved)
    })
  }

  /**
   * Move a Snoozed item back to the Inbox
   */
  unsnooze(id: string): Promise<TrackedChange> {
    return this.lock(() => {
      const change = this.snoozed.find(item => item.id === id)
      if (!change) {
        throw new NotFoundError(id, 'snoozed')
      }

      const moved: TrackedChange = { ...cloneChange(change), state: 'inbox' }
      const previousInbox = this.inbox
      const nextInbox = [...previousInbox, moved]
      const nextSnoozed = this.snoozed.filter(item => item.id !== id)

      this.store.writeQueue('inbox', nextInbox)
      try {
        this.store.writeQueue('snoozed', nextSnoozed)
      } catch (err) {
        this.rollback('inbox queue', () => this.store.writeQueue('inbox', previousInbox))
        throw err
      }

      this.inbox = nextInbox
      this.snoozed = nextSnoozed
      this.log(`unsnoozed ${id}`)
      return cloneChange(moved)
    })
  }

  /**
   * Discard an Inbox item for good; its identity stays blocked
   */
  ignore(id: string): Promise<TrackedChange> {
    return this.lock(() => {
      const change = this.inbox.find(item => item.id === id)
      if (!change) {
        throw new NotFoundError(id, 'inbox')
      }

      const previousIgnored = this.ignored
      const nextIgnored = new Set(previousIgnored)
      nextIgnored.add(identityKey(change.source, change.title))
      const nextInbox = this.inbox.filter(item => item.id !== id)

      this.store.writeIgnored(nextIgnored)
      try {
        this.store.writeQueue('inbox', nextInbox)
      } catch (err) {
        this.rollback('ignored keys', () => this.store.writeIgnored(previousIgnored))
        throw err
      }

      this.ignored = nextIgnored
      this.inbox = nextInbox
      this.log(`ignored ${id}`)
      return cloneChange(change)
    })
  }

  /**
   * Delete a Snoozed item without a tombstone
   */
  removeSnoozed(id: string): Promise<TrackedChange> {
    return this.lock(() => {
      const change = this.snoozed.find(item => item.id === id)
      if (!change) {
        throw new NotFoundError(id, 'snoozed')
      }

      const nextSnoozed = this.snoozed.filter(item => item.id !== id)
      this.store.writeQueue('snoozed', nextSnoozed)
      this.snoozed = nextSnoozed
      this.log(`removed snoozed ${id}`)
      return cloneChange(change)
    })
  }

  // ---------------------------------------------------------------------------
  // Library
  // ---------------------------------------------------------------------------

  private requireRecord(id: string): StoredRecord {
    const stored = this.library.get(id)
    if (!stored) {
      throw new NotFoundError(id, 'library')
    }
    return stored
  }

  private rewriteRecord(id: string, next: VaultRecord, action: string): VaultRecord {
    const previous = this.requireRecord(id)
    const filePath = this.store.writeRecord(next)
    if (previous.filePath !== filePath) {
      this.store.deleteRecordFile(previous.filePath)
    }
    this.library.set(id, { record: next, filePath })
    this.log(`${action} ${id}`)
    return cloneRecord(next)
  }

  editRationale(id: string, rationale: string): Promise<VaultRecord> {
    return this.lock(() => {
      const trimmed = requireRationale(rationale, id)
      const { record } = this.requireRecord(id)
      return this.rewriteRecord(id, { ...record, tags: [...record.tags], rationale: trimmed }, 'updated rationale of')
    })
  }

  /**
   * Replace tags and/or verification; omitted fields are kept
   */
  editRecord(id: string, input: EditRecordInput): Promise<VaultRecord> {
    return this.lock(() => {
      const { record } = this.requireRecord(id)
      let next: VaultRecord = { ...record, tags: [...record.tags] }
      if (input.tags !== undefined) {
        next.tags = normalizeTags(input.tags)
      }
      if (input.verification !== undefined) {
        next = withVerification(next, optionalVerification(input.verification))
      }
      return this.rewriteRecord(id, next, 'edited')
    })
  }

  setRecordStatus(id: string, status: RecordStatus): Promise<VaultRecord> {
    return this.lock(() => {
      const { record } = this.requireRecord(id)
      return this.rewriteRecord(id, { ...record, tags: [...record.tags], status }, `set ${status}:`)
    })
  }

  /**
   * Delete a Record file; the identity may be detected again later
   */
  removeRecord(id: string): Promise<VaultRecord> {
    return this.lock(() => {
      const { record, filePath } = this.requireRecord(id)
      this.store.deleteRecordFile(filePath)
      this.library.delete(id)
      this.log(`removed ${id}`)
      return cloneRecord(record)
    })
  }

  /**
   * Create a Record directly, without going through the Inbox
   */
  capture(input: CaptureInput): Promise<AcceptResult> {
    return this.lock(() => {
      const title = input.title.trim()
      if (!title) {
        throw new ValidationError('Title cannot be empty', 'INVALID_INPUT', {
          suggestion: 'Pass a title, e.g. setupvault capture "postgres"'
        })
      }
      const rationale = requireRationale(input.rationale)
      const source = input.source?.trim() || 'manual'

      const key = identityKey(source, title)
      if (this.liveKeys().has(key)) {
        throw new DuplicateIdentityError(key)
      }

      const record: VaultRecord = {
        id: this.generateId(),
        title,
        entryKind: input.entryKind ?? 'other',
        source,
        command: input.command?.trim() || 'manual entry',
        systemInfo: input.systemInfo ?? defaultSystemInfo(),
        detectedAt: this.now().toISOString(),
        status: 'active',
        tags: normalizeTags(input.tags),
        rationale
      }
      const verification = optionalVerification(input.verification)
      if (verification !== undefined) record.verification = verification

      const filePath = this.store.writeRecord(record)
      this.library.set(record.id, { record, filePath })
      this.log(`captured ${key} as ${record.id}`)
      return { id: record.id, record: cloneRecord(record), filePath, warnings: [] }
    })
  }
}
