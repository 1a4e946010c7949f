/**
 * SetupVault Snapshot Store
 *
 * One file per scanner identity holding the identity keys seen on that
 * source's last successful scan:
 *
 * .state/detectors/
 * ├── homebrew.yaml
 * └── mac%20defaults.yaml
 *
 * File names are the URI-encoded source name. A snapshot is overwritten
 * wholesale and never touched when its source fails.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { SnapshotRecord } from '../types.js'
import { CorruptRecordError, VaultIOError } from './errors.js'
import { snapshotFileSchema } from './schemas.js'
import { isMissingFileError, readYamlFile, writeYamlFile } from './yaml-file.js'

export class SnapshotStore {
  readonly dir: string

  constructor(stateDir: string) {
    this.dir = path.join(stateDir, 'detectors')
  }

  pathFor(source: string): string {
    const name = encodeURIComponent(source).replace(/\*/g, '%2A') || '%00'
    return path.join(this.dir, `${name}.yaml`)
  }

  /**
   * Load the snapshot for a source; an absent file is an empty snapshot
   */
  load(source: string): SnapshotRecord {
    const filePath = this.pathFor(source)
    const file = readYamlFile(filePath, snapshotFileSchema)
    if (!file) {
      return { source, updatedAt: '', keys: [] }
    }
    // Case-insensitive filesystems can map two sources onto one file
    if (file.source !== source) {
      throw new CorruptRecordError(filePath, `snapshot belongs to source "${file.source}", not "${source}"`)
    }
    return {
      source: file.source,
      updatedAt: file.updated_at,
      keys: file.keys
    }
  }

  /**
   * Replace the snapshot for a source with its full current key set
   */
  save(source: string, keys: Iterable<string>, updatedAt: string = new Date().toISOString()): SnapshotRecord {
    const sorted = [...new Set(keys)].sort()
    writeYamlFile(this.pathFor(source), {
      source,
      updated_at: updatedAt,
      keys: sorted
    })
    return { source, updatedAt, keys: sorted }
  }

  /**
   * Sources that currently have a snapshot file, as stored in each file
   */
  list(): string[] {
    let names: string[]
    try {
      names = fs.readdirSync(this.dir)
    } catch (err) {
      if (isMissingFileError(err)) return []
      throw new VaultIOError('list', this.dir, err)
    }
    const sources: string[] = []
    for (const name of names.filter(entry => entry.endsWith('.yaml'))) {
      const file = readYamlFile(path.join(this.dir, name), snapshotFileSchema)
      if (file) sources.push(file.source)
    }
    return sources.sort()
  }
}
