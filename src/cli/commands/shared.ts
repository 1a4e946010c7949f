/**
 * SetupVault CLI - Shared command helpers
 */

import type { CLIArgs, EntryKind, RecordStatus, TrackedChange, VaultRecord } from '../../types.js'
import { ENTRY_KINDS, RECORD_STATUSES } from '../../types.js'
import type { SetupVault } from '../../client.js'
import type { ResolvedConfig } from '../../lib/config-loader.js'
import { ValidationError } from '../../lib/errors.js'
import { parseTagList } from '../../lib/identity.js'
import { c } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface CommandContext {
  args: CLIArgs
  config: ResolvedConfig
  configPath: string
  vault: SetupVault
  verbose: boolean
  dryRun: boolean
  jsonOutput: boolean
}

/**
 * Positional argument at `index` of `_` (0 is the command itself)
 */
export function requireArg(args: CLIArgs, index: number, name: string, usage: string): string {
  const value = args._[index]?.trim()
  if (!value) {
    throw new ValidationError(`Missing required argument: ${name}`, 'INVALID_INPUT', {
      suggestion: `Usage: ${usage}`
    })
  }
  return value
}

function isEntryKind(value: string): value is EntryKind {
  return ENTRY_KINDS.some(kind => kind === value)
}

function isRecordStatus(value: string): value is RecordStatus {
  return RECORD_STATUSES.some(status => status === value)
}

export function parseEntryKind(value: string | undefined): EntryKind | undefined {
  if (value === undefined) return undefined
  const kind = value.trim().toLowerCase()
  if (!isEntryKind(kind)) {
    throw new ValidationError(`Unknown entry kind: ${value}`, 'INVALID_INPUT', {
      suggestion: `Use one of: ${ENTRY_KINDS.join(', ')}`
    })
  }
  return kind
}

export function parseRecordStatus(value: string): RecordStatus {
  const status = value.trim().toLowerCase()
  if (!isRecordStatus(status)) {
    throw new ValidationError(`Unknown status: ${value}`, 'INVALID_INPUT', {
      suggestion: `Use one of: ${RECORD_STATUSES.join(', ')}`
    })
  }
  return status
}

export function parseTagsOption(value: string | undefined): string[] | undefined {
  return value === undefined ? undefined : parseTagList(value)
}

export function printJson(value: unknown): void {
  ui.output(JSON.stringify(value, null, 2))
}

// =============================================================================
// Rendering
// =============================================================================

export function printChanges(changes: TrackedChange[], emptyMessage: string): void {
  if (changes.length === 0) {
    ui.log(c.muted(emptyMessage))
    return
  }
  ui.output(ui.formatTable(
    [
      { key: 'id', header: 'ID' },
      { key: 'source', header: 'SOURCE' },
      { key: 'title', header: 'TITLE' },
      { key: 'kind', header: 'KIND' },
      { key: 'observed', header: 'OBSERVED' }
    ],
    changes.map(change => ({
      id: change.id,
      source: change.source,
      title: change.title,
      kind: change.entryKind,
      observed: change.observedAt
    }))
  ))
}

export function printRecords(records: VaultRecord[], emptyMessage: string): void {
  if (records.length === 0) {
    ui.log(c.muted(emptyMessage))
    return
  }
  ui.output(ui.formatTable(
    [
      { key: 'id', header: 'ID' },
      { key: 'source', header: 'SOURCE' },
      { key: 'title', header: 'TITLE' },
      { key: 'status', header: 'STATUS' },
      { key: 'tags', header: 'TAGS' }
    ],
    records.map(record => ({
      id: record.id,
      source: record.source,
      title: record.title,
      status: record.status,
      tags: record.tags.join(',')
    }))
  ))
}
