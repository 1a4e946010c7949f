/**
 * Atomic Write Utilities
 *
 * Every persisted file goes through here: the content is written to a temp
 * file beside the target, flushed to disk, then renamed over the target.
 * Readers observe either the old complete file or the new complete file.
 */

import fs from 'node:fs'
import path from 'node:path'
import { VaultIOError } from './errors.js'

let tempCounter = 0

function tempPathFor(filePath: string): string {
  tempCounter++
  const dir = path.dirname(filePath)
  const base = path.basename(filePath)
  return path.join(dir, `.${base}.${process.pid}.${Date.now()}.${tempCounter}.tmp`)
}

/**
 * Atomically write string data to a file, creating parent directories
 *
 * @throws VaultIOError if any step fails; the target keeps its old content
 */
export function atomicWriteFile(filePath: string, data: string | Buffer): void {
  const dir = path.dirname(filePath)

  try {
    fs.mkdirSync(dir, { recursive: true })
  } catch (err) {
    throw new VaultIOError('create directory', dir, err)
  }

  const tempPath = tempPathFor(filePath)

  try {
    const fd = fs.openSync(tempPath, 'w')
    try {
      fs.writeFileSync(fd, data)
      fs.fsyncSync(fd)
    } finally {
      fs.closeSync(fd)
    }
    fs.renameSync(tempPath, filePath)
  } catch (err) {
    removeIfExists(tempPath)
    throw new VaultIOError('write', filePath, err)
  }
}

/**
 * Atomically copy a file's bytes to a new location
 */
export function atomicCopyFile(sourcePath: string, targetPath: string): void {
  let data: Buffer
  try {
    data = fs.readFileSync(sourcePath)
  } catch (err) {
    throw new VaultIOError('read', sourcePath, err)
  }
  atomicWriteFile(targetPath, data)
}

/**
 * Delete a file; a file that is already gone is not an error
 */
export function removeFile(filePath: string): void {
  try {
    fs.rmSync(filePath, { force: true })
  } catch (err) {
    throw new VaultIOError('remove', filePath, err)
  }
}

// Cleanup after a failed write. The write error is what the caller sees.
function removeIfExists(filePath: string): void {
  try {
    fs.rmSync(filePath, { force: true })
  } catch (cleanupError) {
    console.error(`[setupvault] could not remove temp file ${filePath}: ${String(cleanupError)}`)
  }
}
