/**
 * SetupVault CLI - Queue Commands
 *
 * Review of detected changes: inbox, snoozed, accept, snooze, unsnooze, ignore
 */

import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext } from './shared.js'
import { parseTagsOption, printChanges, printJson, requireArg } from './shared.js'

export async function runInbox(context: CommandContext): Promise<void> {
  const inbox = await context.vault.inbox()
  if (context.jsonOutput) {
    printJson(inbox)
    return
  }
  printChanges(inbox, 'Inbox is empty')
}

export async function runSnoozedList(context: CommandContext): Promise<void> {
  const snoozed = await context.vault.snoozed()
  if (context.jsonOutput) {
    printJson(snoozed)
    return
  }
  printChanges(snoozed, 'Nothing snoozed')
}

export async function runAccept(context: CommandContext): Promise<void> {
  const { args, vault, jsonOutput } = context
  const id = requireArg(args, 1, 'id', 'setupvault accept <id> --rationale "<why>"')

  const result = await vault.accept(id, {
    rationale: args.rationale ?? '',
    tags: parseTagsOption(args.tag),
    verification: args.verification
  })

  for (const warning of result.warnings) {
    print.warning(warning.message)
  }

  if (jsonOutput) {
    printJson({
      record: result.record,
      filePath: result.filePath,
      warnings: result.warnings
    })
    return
  }
  print.success(`Accepted ${result.record.title}`)
  ui.log(`  ${c.path(result.filePath)}`)
}

export async function runSnooze(context: CommandContext): Promise<void> {
  const id = requireArg(context.args, 1, 'id', 'setupvault snooze <id>')
  const change = await context.vault.snooze(id)
  if (context.jsonOutput) {
    printJson(change)
    return
  }
  print.success(`Snoozed ${change.title}`)
}

export async function runUnsnooze(context: CommandContext): Promise<void> {
  const id = requireArg(context.args, 1, 'id', 'setupvault unsnooze <id>')
  const change = await context.vault.unsnooze(id)
  if (context.jsonOutput) {
    printJson(change)
    return
  }
  print.success(`Moved ${change.title} back to the inbox`)
}

export async function runIgnore(context: CommandContext): Promise<void> {
  const id = requireArg(context.args, 1, 'id', 'setupvault ignore <id>')
  const change = await context.vault.ignore(id)
  if (context.jsonOutput) {
    printJson(change)
    return
  }
  print.success(`Ignored ${change.title}; it will not be queued again`)
}
