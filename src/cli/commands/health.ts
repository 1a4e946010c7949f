/**
 * SetupVault CLI - Health Command
 */

import { formatHealth } from '../../lib/health.js'
import { c, colorHealth } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext } from './shared.js'
import { printJson } from './shared.js'

export async function runHealth(context: CommandContext): Promise<void> {
  const stats = await context.vault.stats()

  if (context.jsonOutput) {
    printJson(stats)
    return
  }

  if (!ui.isTTY) {
    ui.output(formatHealth(stats.health))
    return
  }

  ui.output(`${c.header('Health')} ${colorHealth(stats.health)}`)
  ui.output(ui.formatKeyValue([
    ['Inbox', String(stats.inbox)],
    ['Snoozed', String(stats.snoozed)],
    ['Active', String(stats.active)],
    ['Ignored', String(stats.ignored)]
  ]))
}
