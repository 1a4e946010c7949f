/**
 * SetupVault CLI - Export Command
 *
 * Copy every record file into another directory, keeping the entries/ layout
 */

import path from 'node:path'
import { print } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext } from './shared.js'
import { printJson, requireArg } from './shared.js'

export async function runExport(context: CommandContext): Promise<void> {
  const { args, vault, jsonOutput, verbose } = context
  const target = path.resolve(requireArg(args, 1, 'target', 'setupvault export <directory>'))

  const written = await vault.export(target)
  for (const file of written) {
    ui.verbose(`wrote ${file}`, verbose)
  }

  if (jsonOutput) {
    printJson({ target, files: written })
    return
  }
  print.success(`Exported ${written.length} record(s) to ${target}`)
}
