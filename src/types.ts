/**
 * SetupVault - Type Definitions
 */

// ============================================================================
// Platform Types
// ============================================================================

/**
 * Platform a scan runs on. Scanners declare which platforms they apply to.
 */
export type Platform = 'macos' | 'linux' | 'windows' | 'other'

export const PLATFORMS: Platform[] = ['macos', 'linux', 'windows', 'other']

/**
 * Map a Node.js `process.platform` value to a SetupVault platform
 */
export function toPlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
  switch (nodePlatform) {
    case 'darwin':
      return 'macos'
    case 'linux':
      return 'linux'
    case 'win32':
      return 'windows'
    default:
      return 'other'
  }
}

/**
 * System metadata recorded with every change detected on this machine
 */
export function defaultSystemInfo(platform: Platform = toPlatform()): SystemInfo {
  return { os: platform, arch: process.arch }
}

// ============================================================================
// Change Types
// ============================================================================

export type EntryKind = 'package' | 'config' | 'application' | 'script' | 'other'

export const ENTRY_KINDS: EntryKind[] = ['package', 'config', 'application', 'script', 'other']

/**
 * Directory each entry kind is partitioned into under entries/
 */
export const ENTRY_KIND_DIRS: Record<EntryKind, string> = {
  package: 'packages',
  config: 'configs',
  application: 'applications',
  script: 'scripts',
  other: 'other'
}

/** System metadata to help reproduce an environment */
export interface SystemInfo {
  os: string
  arch: string
}

/**
 * A change reported by a scanner. Produced fresh on every scan and never
 * persisted on its own.
 */
export interface CandidateChange {
  /** Scanner identity, e.g. "homebrew" */
  source: string
  /** Human label, e.g. "jq" */
  title: string
  entryKind: EntryKind
  /** Command that reproduces the change (may be empty) */
  command: string
  systemInfo: SystemInfo
  /** ISO-8601 timestamp */
  observedAt: string
  /** File the change refers to (dotfiles, app bundles) */
  path?: string
  /** Suggested tags */
  tags?: string[]
}

export type TrackedState = 'inbox' | 'snoozed'

/**
 * A candidate that entered the Inbox or Snoozed queue
 */
export interface TrackedChange extends CandidateChange {
  id: string
  state: TrackedState
}

export type RecordStatus = 'active' | 'ignored'

export const RECORD_STATUSES: RecordStatus[] = ['active', 'ignored']

/**
 * An accepted change, persisted as one file in the vault
 */
export interface VaultRecord {
  readonly id: string
  readonly title: string
  readonly entryKind: EntryKind
  readonly source: string
  readonly command: string
  readonly systemInfo: SystemInfo
  readonly detectedAt: string
  status: RecordStatus
  tags: string[]
  rationale: string
  verification?: string
}

/**
 * Identity keys seen for one source on its last successful scan
 */
export interface SnapshotRecord {
  source: string
  updatedAt: string
  keys: string[]
}

// ============================================================================
// Scanner Contract
// ============================================================================

export interface ScanContext {
  platform: Platform
  systemInfo: SystemInfo
  /** Timestamp every candidate of this run carries */
  observedAt: string
  signal?: AbortSignal
}

/**
 * Capability every source-specific scanner implements.
 * Failure is signalled by rejecting.
 */
export interface Scanner {
  /** Stable scanner identity; used as `source` on every candidate */
  readonly name: string
  /** Platforms the scanner applies to (omitted = all) */
  readonly platforms?: readonly Platform[]
  scan(context: ScanContext): Promise<CandidateChange[]>
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  _: string[]
  verbose?: boolean
  quiet?: boolean
  json?: boolean
  'dry-run'?: boolean
  path?: string
  // Command-specific options
  rationale?: string
  tag?: string
  verification?: string
  kind?: string
  source?: string
  cmd?: string
  status?: string
  snoozed?: boolean
  timeout?: number
}
