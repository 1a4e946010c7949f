/**
 * Validated YAML file IO on top of the atomic writer
 */

import fs from 'node:fs'
import YAML from 'yaml'
import type { z } from 'zod'
import { atomicWriteFile } from './atomic-write.js'
import { CorruptRecordError, VaultIOError } from './errors.js'
import { describeIssue } from './schemas.js'

/**
 * Read and validate a YAML file
 *
 * @returns the parsed value, or undefined when the file does not exist
 * @throws CorruptRecordError on a parse or schema failure
 */
export function readYamlFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): z.output<S> | undefined {
  let content: string
  try {
    content = fs.readFileSync(filePath, 'utf-8')
  } catch (err) {
    if (isMissingFileError(err)) return undefined
    throw new VaultIOError('read', filePath, err)
  }

  return parseYamlContent(content, filePath, schema)
}

export function parseYamlContent<S extends z.ZodTypeAny>(
  content: string,
  filePath: string,
  schema: S
): z.output<S> {
  let raw: unknown
  try {
    raw = YAML.parse(content)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new CorruptRecordError(filePath, `invalid YAML: ${reason}`, err)
  }

  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new CorruptRecordError(filePath, describeIssue(result.error), result.error)
  }
  return result.data
}

export function writeYamlFile(filePath: string, value: unknown): void {
  atomicWriteFile(filePath, YAML.stringify(value))
}

export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
