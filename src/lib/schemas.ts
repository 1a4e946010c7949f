/**
 * Schemas for every file persisted under a vault root.
 *
 * Files use snake_case keys; the in-memory types use camelCase.
 */

import { z } from 'zod'

const entryKindSchema = z.enum(['package', 'config', 'application', 'script', 'other'])

const systemInfoSchema = z.object({
  os: z.string(),
  arch: z.string()
})

export const frontmatterSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  type: entryKindSchema,
  source: z.string().min(1),
  cmd: z.string().default(''),
  system: systemInfoSchema,
  detected_at: z.string().min(1),
  status: z.enum(['active', 'ignored']),
  tags: z.array(z.string()).default([])
})

export type Frontmatter = z.infer<typeof frontmatterSchema>

export const queueItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  type: entryKindSchema,
  source: z.string().min(1),
  cmd: z.string().default(''),
  system: systemInfoSchema,
  detected_at: z.string().min(1),
  path: z.string().optional(),
  tags: z.array(z.string()).optional()
})

export type QueueItem = z.infer<typeof queueItemSchema>

// An empty YAML document parses to null
export const queueFileSchema = z.array(queueItemSchema).nullable()

export const snapshotFileSchema = z.object({
  source: z.string().min(1),
  updated_at: z.string().min(1),
  keys: z.array(z.string()).default([])
})

export const ignoredFileSchema = z.array(z.string()).nullable()

/**
 * First issue of a failed parse, as "path: message"
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return error.message
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
  return `${where}: ${issue.message}`
}
