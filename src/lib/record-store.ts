/**
 * SetupVault Record Store
 *
 * Durable layout of a vault root. Every write goes through the atomic writer.
 *
 * Structure:
 * <root>/
 * ├── entries/
 * │   └── {packages|configs|applications|scripts|other}/
 * │       └── {source}/
 * │           └── {source}-{slug}-{id}.md   # YAML frontmatter + Markdown
 * └── .state/
 *     ├── inbox.yaml
 *     ├── snoozed.yaml
 *     ├── ignored.yaml                      # tombstoned identity keys
 *     └── detectors/{source}.yaml           # see snapshot-store.ts
 */

import fs from 'node:fs'
import path from 'node:path'
import YAML from 'yaml'
import { glob } from 'tinyglobby'
import type { TrackedChange, TrackedState, VaultRecord } from '../types.js'
import { ENTRY_KIND_DIRS } from '../types.js'
import { atomicCopyFile, atomicWriteFile, removeFile } from './atomic-write.js'
import { CorruptRecordError, VaultIOError, VaultNotInitializedError } from './errors.js'
import { normalizeTags, safeSegment } from './identity.js'
import type { Frontmatter, QueueItem } from './schemas.js'
import { frontmatterSchema, ignoredFileSchema, queueFileSchema } from './schemas.js'
import { SnapshotStore } from './snapshot-store.js'
import { parseYamlContent, readYamlFile, writeYamlFile } from './yaml-file.js'

// =============================================================================
// Types
// =============================================================================

export interface StoredRecord {
  record: VaultRecord
  filePath: string
}

export interface RecordListing {
  records: StoredRecord[]
  errors: CorruptRecordError[]
}

const ENTRIES_DIR = 'entries'
const STATE_DIR = '.state'
const FRONTMATTER_OPEN = '---\n'
const FRONTMATTER_CLOSE = '\n---\n'
const RATIONALE_HEADING = '# Rationale\n'
const VERIFICATION_HEADING = '\n# Verification\n'

const SECTION_HEADINGS = ['# Rationale', '# Verification']

/**
 * First line of `text` that would be read back as a section heading
 */
export function findSectionHeading(text: string): string | undefined {
  return text
    .split(/\r?\n/)
    .map(line => line.trimEnd())
    .find(line => SECTION_HEADINGS.includes(line))
}

// =============================================================================
// Markdown Rendering
// =============================================================================

/**
 * Render a record as YAML frontmatter followed by its Markdown sections
 */
export function renderRecord(record: VaultRecord): string {
  const frontmatter: Frontmatter = {
    id: record.id,
    title: record.title,
    type: record.entryKind,
    source: record.source,
    cmd: record.command,
    system: { os: record.systemInfo.os, arch: record.systemInfo.arch },
    detected_at: record.detectedAt,
    status: record.status,
    tags: record.tags
  }

  return [
    FRONTMATTER_OPEN,
    YAML.stringify(frontmatter),
    '---\n\n',
    RATIONALE_HEADING,
    record.rationale,
    '\n',
    VERIFICATION_HEADING,
    record.verification ?? '',
    '\n'
  ].join('')
}

/**
 * Parse a record file
 *
 * The rationale ends at the first `# Verification` heading, so neither
 * section may contain a heading line of its own.
 *
 * @throws CorruptRecordError naming the file and the first problem found
 */
export function parseRecord(content: string, filePath: string): VaultRecord {
  const normalized = content.replace(/\r\n/g, '\n')
  if (!normalized.startsWith(FRONTMATTER_OPEN)) {
    throw new CorruptRecordError(filePath, 'missing frontmatter header')
  }

  const rest = normalized.slice(FRONTMATTER_OPEN.length)
  const end = rest.indexOf(FRONTMATTER_CLOSE)
  if (end === -1) {
    throw new CorruptRecordError(filePath, 'unterminated frontmatter')
  }

  const fm = parseYamlContent(rest.slice(0, end), filePath, frontmatterSchema)
  const body = rest.slice(end + FRONTMATTER_CLOSE.length).trimStart()

  if (!body.startsWith(RATIONALE_HEADING)) {
    throw new CorruptRecordError(filePath, 'missing rationale section')
  }

  const sections = body.slice(RATIONALE_HEADING.length)
  const split = sections.indexOf(VERIFICATION_HEADING)
  const rationale = (split === -1 ? sections : sections.slice(0, split)).trim()
  const verification = split === -1 ? '' : sections.slice(split + VERIFICATION_HEADING.length).trim()

  if (!rationale) {
    throw new CorruptRecordError(filePath, 'rationale is empty')
  }

  const record: VaultRecord = {
    id: fm.id,
    title: fm.title,
    entryKind: fm.type,
    source: fm.source,
    command: fm.cmd,
    systemInfo: fm.system,
    detectedAt: fm.detected_at,
    status: fm.status,
    tags: normalizeTags(fm.tags),
    rationale
  }
  if (verification) {
    record.verification = verification
  }
  return record
}

// =============================================================================
// Queue Conversion
// =============================================================================

function toQueueItem(change: TrackedChange): QueueItem {
  const item: QueueItem = {
    id: change.id,
    title: change.title,
    type: change.entryKind,
    source: change.source,
    cmd: change.command,
    system: { os: change.systemInfo.os, arch: change.systemInfo.arch },
    detected_at: change.observedAt
  }
  if (change.path !== undefined) item.path = change.path
  if (change.tags && change.tags.length > 0) item.tags = change.tags
  return item
}

function fromQueueItem(item: QueueItem, state: TrackedState): TrackedChange {
  const change: TrackedChange = {
    id: item.id,
    state,
    source: item.source,
    title: item.title,
    entryKind: item.type,
    command: item.cmd,
    systemInfo: item.system,
    observedAt: item.detected_at
  }
  if (item.path !== undefined) change.path = item.path
  if (item.tags !== undefined) change.tags = item.tags
  return change
}

// =============================================================================
// Record Store
// =============================================================================

export class RecordStore {
  readonly root: string
  readonly entriesDir: string
  readonly stateDir: string
  readonly snapshots: SnapshotStore

  constructor(root: string) {
    this.root = path.resolve(root)
    this.entriesDir = path.join(this.root, ENTRIES_DIR)
    this.stateDir = path.join(this.root, STATE_DIR)
    this.snapshots = new SnapshotStore(this.stateDir)
  }

  // ---------------------------------------------------------------------------
  // Layout
  // ---------------------------------------------------------------------------

  queuePath(state: TrackedState): string {
    return path.join(this.stateDir, `${state}.yaml`)
  }

  get ignoredPath(): string {
    return path.join(this.stateDir, 'ignored.yaml')
  }

  isInitialized(): boolean {
    return fs.existsSync(this.entriesDir) && fs.existsSync(this.stateDir)
  }

  ensureInitialized(): void {
    if (!this.isInitialized()) {
      throw new VaultNotInitializedError(this.root)
    }
  }

  /**
   * Create the directory structure and empty queues; existing files are kept
   *
   * @returns true when anything had to be created
   */
  init(): boolean {
    const existed = this.isInitialized()
    const dirs = [
      ...Object.values(ENTRY_KIND_DIRS).map(dir => path.join(this.entriesDir, dir)),
      this.snapshots.dir
    ]
    for (const dir of dirs) {
      try {
        fs.mkdirSync(dir, { recursive: true })
      } catch (err) {
        throw new VaultIOError('create directory', dir, err)
      }
    }
    for (const state of ['inbox', 'snoozed'] as const) {
      if (!fs.existsSync(this.queuePath(state))) {
        this.writeQueue(state, [])
      }
    }
    return !existed
  }

  /**
   * Deterministic location of a record file
   */
  recordPath(record: Pick<VaultRecord, 'id' | 'title' | 'entryKind' | 'source'>): string {
    const source = safeSegment(record.source)
    const slug = safeSegment(record.title, 'entry')
    return path.join(
      this.entriesDir,
      ENTRY_KIND_DIRS[record.entryKind],
      source,
      `${source}-${slug}-${record.id}.md`
    )
  }

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  writeRecord(record: VaultRecord): string {
    const filePath = this.recordPath(record)
    atomicWriteFile(filePath, renderRecord(record))
    return filePath
  }

  deleteRecordFile(filePath: string): void {
    removeFile(filePath)
  }

  readRecord(filePath: string): VaultRecord {
    let content: string
    try {
      content = fs.readFileSync(filePath, 'utf-8')
    } catch (err) {
      throw new VaultIOError('read', filePath, err)
    }
    return parseRecord(content, filePath)
  }

  /**
   * Absolute paths of every record file, sorted
   */
  async listRecordFiles(): Promise<string[]> {
    if (!fs.existsSync(this.entriesDir)) return []
    const files = await glob('**/*.md', {
      cwd: this.entriesDir,
      absolute: true
    })
    return files.map(file => path.resolve(file)).sort()
  }

  /**
   * Locate a record file by the id suffix of its name
   */
  async findRecordFile(id: string): Promise<string | undefined> {
    const suffix = `-${id}.md`
    const files = await this.listRecordFiles()
    return files.find(file => path.basename(file).endsWith(suffix))
  }

  /**
   * Read every record, collecting corrupt files instead of failing
   */
  async listRecords(): Promise<RecordListing> {
    const records: StoredRecord[] = []
    const errors: CorruptRecordError[] = []

    for (const filePath of await this.listRecordFiles()) {
      try {
        records.push({ record: this.readRecord(filePath), filePath })
      } catch (err) {
        if (err instanceof CorruptRecordError) {
          errors.push(err)
          continue
        }
        throw err
      }
    }

    return { records, errors }
  }

  /**
   * Read every record, failing on the first corrupt file
   */
  async loadRecords(): Promise<StoredRecord[]> {
    const { records, errors } = await this.listRecords()
    if (errors.length > 0) {
      throw errors[0]
    }
    return records
  }

  // ---------------------------------------------------------------------------
  // Queues and tombstones
  // ---------------------------------------------------------------------------

  readQueue(state: TrackedState): TrackedChange[] {
    const items = readYamlFile(this.queuePath(state), queueFileSchema) ?? []
    return items.map(item => fromQueueItem(item, state))
  }

  writeQueue(state: TrackedState, changes: readonly TrackedChange[]): void {
    writeYamlFile(this.queuePath(state), changes.map(toQueueItem))
  }

  readIgnored(): string[] {
    return readYamlFile(this.ignoredPath, ignoredFileSchema) ?? []
  }

  writeIgnored(keys: Iterable<string>): void {
    writeYamlFile(this.ignoredPath, [...new Set(keys)].sort())
  }

  // ---------------------------------------------------------------------------
  // Export
  // ---------------------------------------------------------------------------

  /**
   * Copy every record file verbatim into `targetDir`, keeping paths relative
   * to the vault root
   *
   * @returns the written file paths
   */
  async exportTo(targetDir: string): Promise<string[]> {
    const target = path.resolve(targetDir)
    if (fs.existsSync(target) && !fs.statSync(target).isDirectory()) {
      throw new VaultIOError('export to', target, new Error('not a directory'))
    }
    // Copies landing under entries/ would be read back as duplicate records
    const landing = path.relative(this.entriesDir, path.join(target, ENTRIES_DIR))
    if (!landing.startsWith(`..${path.sep}`) && landing !== '..' && !path.isAbsolute(landing)) {
      throw new VaultIOError('export to', target, new Error('target would place copies inside the vault entries'))
    }

    const written: string[] = []
    for (const filePath of await this.listRecordFiles()) {
      const destination = path.join(target, path.relative(this.root, filePath))
      atomicCopyFile(filePath, destination)
      written.push(destination)
    }
    return written
  }
}
