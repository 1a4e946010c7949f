/**
 * SetupVault - Document ad-hoc machine changes as rationale-backed records
 *
 * Main library exports for programmatic usage
 */

// Client
export { SetupVault, createVault } from './client.js'
export type { SetupVaultOptions, RunScanOptions, RefreshResult } from './client.js'

// Types
export type {
  Platform,
  EntryKind,
  SystemInfo,
  CandidateChange,
  TrackedState,
  TrackedChange,
  RecordStatus,
  VaultRecord,
  SnapshotRecord,
  ScanContext,
  Scanner
} from './types.js'

export { PLATFORMS, ENTRY_KINDS, ENTRY_KIND_DIRS, RECORD_STATUSES, toPlatform, defaultSystemInfo } from './types.js'

// Lifecycle
export { LifecycleController } from './domain/lifecycle.js'
export type {
  AcceptInput,
  AcceptResult,
  CaptureInput,
  EditRecordInput,
  IngestResult,
  LifecycleOptions
} from './domain/lifecycle.js'

// Engine pieces
export { runScanners } from './lib/scan-runner.js'
export type { ScanRunOptions, ScanRunResult, ScannerRun } from './lib/scan-runner.js'
export { diffCandidates } from './lib/differ.js'
export type { DiffInput, DiffResult } from './lib/differ.js'
export { RecordStore, renderRecord, parseRecord } from './lib/record-store.js'
export type { StoredRecord, RecordListing } from './lib/record-store.js'
export { SnapshotStore } from './lib/snapshot-store.js'
export { calculateHealth, calculateStats, formatHealth } from './lib/health.js'
export type { VaultCounts, VaultStats } from './lib/health.js'
export { identityKey, slugify, normalizeTags } from './lib/identity.js'
export { atomicWriteFile } from './lib/atomic-write.js'
export { findSecretSignals, checkFileForSecrets, DEFAULT_SECRET_SIGNALS } from './lib/secret-patterns.js'
export type { SecretWarning } from './lib/secret-patterns.js'

// Config utilities
export {
  loadConfig,
  getConfigPath,
  resolveVaultRoot,
  saveVaultPath,
  expandEnvVars,
  expandHome,
  DEFAULT_CONFIG
} from './lib/config-loader.js'
export type { ResolvedConfig } from './lib/config-loader.js'

// Scanners
export {
  listApplicableScanners,
  createScannerCatalogue,
  defineCommandScanner,
  runCommand
} from './scanners/index.js'
export type { ScannerOptions, CommandRunner } from './scanners/index.js'

// Errors
export * from './lib/errors.js'
