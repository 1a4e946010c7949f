/**
 * SetupVault CLI - Scan Commands
 *
 * scan      run the applicable scanners and queue what is new
 * scanners  list the scanners that apply to this machine
 */

import { toPlatform } from '../../types.js'
import { c, print, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'
import type { CommandContext } from './shared.js'
import { printJson } from './shared.js'

export async function runScan(context: CommandContext): Promise<void> {
  const { vault, dryRun, jsonOutput } = context
  await vault.open()

  const scan = await ui.withSpinner(
    'Scanning...',
    spinner => vault.runScan({
      onProgress: (completed, total, source) => spinner.update(`Scanning... ${completed}/${total} (${source})`)
    }),
    { successText: result => `Scanned ${result.sources.length} source(s)`, failText: 'Scan aborted' }
  )

  for (const error of scan.errors) {
    print.warning(error.message)
  }

  if (dryRun) {
    if (jsonOutput) {
      printJson({
        dryRun: true,
        candidates: scan.candidates.length,
        sources: scan.sources,
        errors: scan.errors.map(error => error.toJSON())
      })
    } else {
      ui.log(`Dry run - ${scan.candidates.length} candidate(s) found, nothing queued`)
    }
    return
  }

  const ingest = await vault.diffAndIngest(scan.candidates, scan.sources)

  if (jsonOutput) {
    printJson({
      ingested: ingest.ingested,
      sources: ingest.snapshots,
      discarded: ingest.discarded,
      errors: scan.errors.map(error => error.toJSON())
    })
    return
  }

  if (ingest.ingested.length === 0) {
    print.info('No new changes')
    return
  }

  print.success(`${ingest.ingested.length} new change(s) in the inbox`)
  for (const change of ingest.ingested) {
    ui.log(`  ${symbols.bullet} ${c.source(change.source)} ${c.title(change.title)} ${c.id(change.id)}`)
  }
  ui.log(`Review with ${c.command('setupvault inbox')}`)
}

export async function runScannerList(context: CommandContext): Promise<void> {
  const { vault, jsonOutput } = context
  const platform = toPlatform()
  const names = vault.listApplicableScanners(platform).map(scanner => scanner.name)

  if (jsonOutput) {
    printJson({ platform, scanners: names })
    return
  }

  ui.log(`${c.label('Platform:')} ${platform}`)
  for (const name of names) {
    ui.output(name)
  }
}
