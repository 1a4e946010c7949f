/**
 * SetupVault CLI - Library Commands
 *
 * Accepted records: list, show, edit, status, remove, capture, search
 */

import { ValidationError } from '../../lib/errors.js'
import { c, colorState, labeled, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext } from './shared.js'
import {
  parseEntryKind,
  parseRecordStatus,
  parseTagsOption,
  printJson,
  printRecords,
  requireArg
} from './shared.js'

export async function runList(context: CommandContext): Promise<void> {
  const { args, vault, jsonOutput } = context
  const status = args.status === undefined ? undefined : parseRecordStatus(args.status)
  const kind = parseEntryKind(args.kind)
  const source = args.source?.trim().toLowerCase()

  const records = (await vault.library()).filter(record =>
    (!status || record.status === status) &&
    (!kind || record.entryKind === kind) &&
    (!source || record.source.toLowerCase() === source)
  )

  if (jsonOutput) {
    printJson(records)
    return
  }
  printRecords(records, 'Library is empty')
}

export async function runShow(context: CommandContext): Promise<void> {
  const { args, vault, jsonOutput } = context
  const id = requireArg(args, 1, 'id', 'setupvault show <id>')
  const record = await vault.getRecord(id)

  if (jsonOutput) {
    printJson(record)
    return
  }

  if (ui.isTTY) {
    ui.output([
      c.title(record.title),
      labeled('ID', c.id(record.id)),
      labeled('Source', c.source(record.source)),
      labeled('Kind', c.kind(record.entryKind)),
      labeled('Status', colorState(record.status)),
      labeled('Command', record.command || c.muted('(none)')),
      labeled('System', `${record.systemInfo.os}/${record.systemInfo.arch}`),
      labeled('Detected', record.detectedAt),
      labeled('Tags', record.tags.map(c.tag).join(', ') || c.muted('(none)')),
      '',
      c.header('Rationale'),
      record.rationale,
      '',
      c.header('Verification'),
      record.verification ?? c.muted('(none)')
    ].join('\n'))
    return
  }
  ui.output(await vault.renderRecord(id))
}

export async function runEdit(context: CommandContext): Promise<void> {
  const { args, vault, jsonOutput } = context
  const id = requireArg(args, 1, 'id', 'setupvault edit <id> [--rationale <text>] [--tag <a,b>] [--verification <text>]')
  const tags = parseTagsOption(args.tag)

  if (args.rationale === undefined && tags === undefined && args.verification === undefined) {
    throw new ValidationError('Nothing to edit', 'INVALID_INPUT', {
      suggestion: 'Pass --rationale, --tag or --verification'
    })
  }

  let record = await vault.getRecord(id)
  if (args.rationale !== undefined) {
    record = await vault.editRationale(id, args.rationale)
  }
  if (tags !== undefined || args.verification !== undefined) {
    record = await vault.editRecord(id, { tags, verification: args.verification })
  }

  if (jsonOutput) {
    printJson(record)
    return
  }
  print.success(`Updated ${record.title}`)
}

export async function runStatus(context: CommandContext): Promise<void> {
  const { args, vault, jsonOutput } = context
  const usage = 'setupvault status <id> <active|ignored>'
  const id = requireArg(args, 1, 'id', usage)
  const status = parseRecordStatus(requireArg(args, 2, 'status', usage))

  const record = await vault.setRecordStatus(id, status)
  if (jsonOutput) {
    printJson(record)
    return
  }
  print.success(`${record.title} is now ${colorState(record.status)}`)
}

export async function runRemove(context: CommandContext): Promise<void> {
  const { args, vault, jsonOutput } = context
  const id = requireArg(args, 1, 'id', 'setupvault remove <id> [--snoozed]')

  if (args.snoozed) {
    const change = await vault.removeSnoozed(id)
    if (jsonOutput) {
      printJson(change)
      return
    }
    print.success(`Removed ${change.title} from snoozed`)
    return
  }

  const record = await vault.removeRecord(id)
  if (jsonOutput) {
    printJson(record)
    return
  }
  print.success(`Removed ${record.title} from the library`)
}

export async function runCapture(context: CommandContext): Promise<void> {
  const { args, vault, jsonOutput } = context
  const title = args._.slice(1).join(' ')

  const result = await vault.capture({
    title,
    rationale: args.rationale ?? '',
    entryKind: parseEntryKind(args.kind),
    source: args.source,
    command: args.cmd,
    tags: parseTagsOption(args.tag),
    verification: args.verification
  })

  if (jsonOutput) {
    printJson({ record: result.record, filePath: result.filePath })
    return
  }
  print.success(`Captured ${result.record.title}`)
  ui.log(`  ${c.path(result.filePath)}`)
}

export async function runSearch(context: CommandContext): Promise<void> {
  const { args, vault, jsonOutput } = context
  const query = args._.slice(1).join(' ')
  const records = await vault.search(query)

  if (jsonOutput) {
    printJson(records)
    return
  }
  printRecords(records, `No records match "${query}"`)
}
