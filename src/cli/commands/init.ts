/**
 * SetupVault CLI - Init Command
 *
 * Create the vault structure and remember its path in the config file
 */

import { saveVaultPath } from '../../lib/config-loader.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext } from './shared.js'
import { printJson } from './shared.js'

export async function runInit(context: CommandContext): Promise<void> {
  const { vault, configPath, verbose, dryRun, jsonOutput } = context

  ui.verbose(`Vault root: ${vault.root}`, verbose)
  ui.verbose(`Config file: ${configPath}`, verbose)

  if (dryRun) {
    if (jsonOutput) {
      printJson({ action: 'init', root: vault.root, configPath, dryRun: true })
    } else {
      ui.log('Dry run - would create:')
      ui.log(`  ${vault.root}/entries/`)
      ui.log(`  ${vault.root}/.state/`)
      ui.log(`  and set vault.path in ${configPath}`)
    }
    return
  }

  const created = vault.init()
  saveVaultPath(vault.root, configPath)

  if (jsonOutput) {
    printJson({ success: true, created, root: vault.root, configPath })
    return
  }

  if (created) {
    print.success(`Initialized vault at ${vault.root}`)
  } else {
    print.info(`Vault already exists at ${vault.root}`)
  }
  ui.log(`Next: ${c.command('setupvault scan')}`)
}
