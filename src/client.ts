/**
 * SetupVault Client
 *
 * Facade over the scan runner, differ, lifecycle controller and record
 * store of one vault root.
 *
 * @example
 * ```ts
 * const vault = createVault({ root: '/tmp/vault' })
 * vault.init()
 * await vault.refresh()
 * for (const change of await vault.inbox()) {
 *   await vault.accept(change.id, { rationale: 'needed for json parsing' })
 * }
 * ```
 */

import type {
  CandidateChange,
  Platform,
  RecordStatus,
  Scanner,
  TrackedChange,
  VaultRecord
} from './types.js'
import { toPlatform } from './types.js'
import type {
  AcceptInput,
  AcceptResult,
  CaptureInput,
  EditRecordInput,
  IngestResult,
  LifecycleOptions
} from './domain/lifecycle.js'
import { LifecycleController } from './domain/lifecycle.js'
import type { ResolvedConfig } from './lib/config-loader.js'
import { DEFAULT_CONFIG, expandHome, resolveVaultRoot } from './lib/config-loader.js'
import { NotFoundError } from './lib/errors.js'
import type { VaultStats } from './lib/health.js'
import { calculateHealth, calculateStats } from './lib/health.js'
import { RecordStore, renderRecord } from './lib/record-store.js'
import type { ScanRunOptions, ScanRunResult } from './lib/scan-runner.js'
import { runScanners } from './lib/scan-runner.js'
import { appliesTo, listApplicableScanners } from './scanners/index.js'

// =============================================================================
// Types
// =============================================================================

export interface SetupVaultOptions {
  /** Vault root (default: resolved from $SETUPVAULT_PATH and config) */
  root?: string
  config?: ResolvedConfig
  /** Scanner set to draw from instead of the built-in catalogue */
  scanners?: Scanner[]
  platform?: Platform
  verbose?: boolean
  generateId?: LifecycleOptions['generateId']
  now?: LifecycleOptions['now']
}

export type RunScanOptions = Pick<ScanRunOptions, 'signal' | 'onProgress' | 'observedAt' | 'systemInfo'> & {
  platform?: Platform
}

export interface RefreshResult {
  scan: ScanRunResult
  ingest: IngestResult
}

// =============================================================================
// Client
// =============================================================================

export class SetupVault {
  readonly root: string
  readonly store: RecordStore
  readonly config: ResolvedConfig
  private readonly platform: Platform
  private readonly scanners?: Scanner[]
  private readonly verbose: boolean
  private readonly lifecycleOptions: LifecycleOptions
  private opening: Promise<LifecycleController> | null = null

  constructor(options: SetupVaultOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG
    this.root = options.root ?? resolveVaultRoot(this.config)
    this.store = new RecordStore(this.root)
    this.platform = options.platform ?? toPlatform()
    this.scanners = options.scanners
    this.verbose = options.verbose || false
    this.lifecycleOptions = {
      verbose: this.verbose,
      generateId: options.generateId,
      now: options.now
    }
  }

  private log(message: string): void {
    if (this.verbose) {
      console.error(`[setupvault] ${message}`)
    }
  }

  // ---------------------------------------------------------------------------
  // Setup
  // ---------------------------------------------------------------------------

  isInitialized(): boolean {
    return this.store.isInitialized()
  }

  /**
   * Create the vault structure; safe to call on an existing vault
   *
   * @returns true when the vault did not exist before
   */
  init(): boolean {
    const created = this.store.init()
    this.log(created ? `initialized vault at ${this.root}` : `vault already exists at ${this.root}`)
    return created
  }

  /**
   * Load queues and records; later calls are no-ops
   */
  async open(): Promise<void> {
    await this.lifecycle()
  }

  /**
   * Concurrent first calls share one open; a failed open is retried on the
   * next call
   */
  private lifecycle(): Promise<LifecycleController> {
    if (!this.opening) {
      this.opening = LifecycleController.open(this.store, this.lifecycleOptions).then(
        controller => {
          this.log(`opened vault at ${this.root}`)
          return controller
        },
        (err: unknown) => {
          this.opening = null
          throw err
        }
      )
    }
    return this.opening
  }

  // ---------------------------------------------------------------------------
  // Scanning
  // ---------------------------------------------------------------------------

  listApplicableScanners(platform: Platform = this.platform): Scanner[] {
    const disabled = this.config.scan.disabled
    if (this.scanners) {
      const skip = new Set(disabled.map(name => name.trim().toLowerCase()))
      return this.scanners.filter(
        scanner => appliesTo(scanner, platform) && !skip.has(scanner.name.toLowerCase())
      )
    }
    return listApplicableScanners(platform, {
      disabled,
      dotfilePaths: this.config.dotfiles.paths.map(filePath => expandHome(filePath))
    })
  }

  /**
   * Run every applicable scanner; nothing is persisted
   */
  async runScan(options: RunScanOptions = {}): Promise<ScanRunResult> {
    const platform = options.platform ?? this.platform
    const scanners = this.listApplicableScanners(platform)
    this.log(`scanning with ${scanners.map(scanner => scanner.name).join(', ') || 'no scanners'}`)

    const result = await runScanners(scanners, {
      ...options,
      platform,
      concurrency: this.config.scan.concurrency,
      timeoutMs: this.config.scan.timeout_ms
    })

    for (const error of result.errors) {
      this.log(`warning: ${error.message}`)
    }
    return result
  }

  /**
   * Queue what is new in `candidates` and update the scanned sources'
   * snapshots. Without `scannedSources`, every source present in
   * `candidates` counts as scanned.
   */
  async diffAndIngest(
    candidates: readonly CandidateChange[],
    scannedSources?: readonly string[]
  ): Promise<IngestResult> {
    const controller = await this.lifecycle()
    return controller.ingestScan(candidates, scannedSources)
  }

  /**
   * Scan, then diff and ingest the sources that succeeded
   */
  async refresh(options: RunScanOptions = {}): Promise<RefreshResult> {
    await this.lifecycle()
    const scan = await this.runScan(options)
    const ingest = await this.diffAndIngest(scan.candidates, scan.sources)
    return { scan, ingest }
  }

  // ---------------------------------------------------------------------------
  // Queues
  // ---------------------------------------------------------------------------

  async inbox(): Promise<TrackedChange[]> {
    return (await this.lifecycle()).getInbox()
  }

  async snoozed(): Promise<TrackedChange[]> {
    return (await this.lifecycle()).getSnoozed()
  }

  async library(): Promise<VaultRecord[]> {
    return (await this.lifecycle()).getLibrary()
  }

  async ingest(candidate: CandidateChange): Promise<TrackedChange> {
    return (await this.lifecycle()).ingest(candidate)
  }

  async accept(id: string, input: AcceptInput): Promise<AcceptResult> {
    const result = await (await this.lifecycle()).accept(id, input)
    for (const warning of result.warnings) {
      this.log(`warning: ${warning.message}`)
    }
    return result
  }

  async snooze(id: string): Promise<TrackedChange> {
    return (await this.lifecycle()).snooze(id)
  }

  async unsnooze(id: string): Promise<TrackedChange> {
    return (await this.lifecycle()).unsnooze(id)
  }

  async ignore(id: string): Promise<TrackedChange> {
    return (await this.lifecycle()).ignore(id)
  }

  async removeSnoozed(id: string): Promise<TrackedChange> {
    return (await this.lifecycle()).removeSnoozed(id)
  }

  // ---------------------------------------------------------------------------
  // Library
  // ---------------------------------------------------------------------------

  async editRationale(id: string, rationale: string): Promise<VaultRecord> {
    return (await this.lifecycle()).editRationale(id, rationale)
  }

  async editRecord(id: string, input: EditRecordInput): Promise<VaultRecord> {
    return (await this.lifecycle()).editRecord(id, input)
  }

  async setRecordStatus(id: string, status: RecordStatus): Promise<VaultRecord> {
    return (await this.lifecycle()).setRecordStatus(id, status)
  }

  async removeRecord(id: string): Promise<VaultRecord> {
    return (await this.lifecycle()).removeRecord(id)
  }

  async capture(input: CaptureInput): Promise<AcceptResult> {
    return (await this.lifecycle()).capture(input)
  }

  /**
   * Read a record from disk
   *
   * @throws NotFoundError when no record file has this id
   * @throws CorruptRecordError when the file exists but cannot be parsed
   */
  async getRecord(id: string): Promise<VaultRecord> {
    const controller = await this.lifecycle()
    const filePath = controller.getRecordEntry(id)?.filePath ?? await this.store.findRecordFile(id)
    if (!filePath) {
      throw new NotFoundError(id, 'library')
    }
    return this.store.readRecord(filePath)
  }

  /**
   * Case-insensitive match on title, tags and rationale
   */
  async search(query: string): Promise<VaultRecord[]> {
    const needle = query.trim().toLowerCase()
    const records = await this.library()
    if (!needle) return records
    return records.filter(record =>
      record.title.toLowerCase().includes(needle) ||
      record.tags.some(tag => tag.includes(needle)) ||
      record.rationale.toLowerCase().includes(needle)
    )
  }

  async renderRecord(id: string): Promise<string> {
    return renderRecord(await this.getRecord(id))
  }

  // ---------------------------------------------------------------------------
  // Reporting
  // ---------------------------------------------------------------------------

  async health(): Promise<number> {
    const controller = await this.lifecycle()
    const active = controller.getLibrary().filter(record => record.status === 'active').length
    return calculateHealth(active, controller.getInbox().length)
  }

  async stats(): Promise<VaultStats> {
    const controller = await this.lifecycle()
    const library = controller.getLibrary()
    return calculateStats({
      inbox: controller.getInbox().length,
      snoozed: controller.getSnoozed().length,
      active: library.filter(record => record.status === 'active').length,
      ignored: library.filter(record => record.status === 'ignored').length
    })
  }

  /**
   * Copy every record file into `targetDir`
   *
   * @returns the written paths
   */
  async export(targetDir: string): Promise<string[]> {
    this.store.ensureInitialized()
    const written = await this.store.exportTo(targetDir)
    this.log(`exported ${written.length} record(s) to ${targetDir}`)
    return written
  }
}

/**
 * Create a new SetupVault client
 */
export function createVault(options?: SetupVaultOptions): SetupVault {
  return new SetupVault(options)
}
