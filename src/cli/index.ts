#!/usr/bin/env node
/**
 * SetupVault CLI
 *
 * Document ad-hoc machine changes as rationale-backed records
 */

import { createCLI, type CommandParseResult, type CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { CLIArgs } from '../types.js'
import { SetupVault } from '../client.js'
import { getConfigPath, loadConfig } from '../lib/config-loader.js'
import { isSetupVaultError, formatErrorForCli } from '../lib/errors.js'
import { c, print, setupvaultFormatter } from './lib/colors.js'
import * as ui from './ui.js'
import type { CommandContext } from './commands/shared.js'

// CLI commands
import { runInit } from './commands/init.js'
import { runScan, runScannerList } from './commands/scan.js'
import { runAccept, runIgnore, runInbox, runSnooze, runSnoozedList, runUnsnooze } from './commands/queue.js'
import {
  runCapture,
  runEdit,
  runList,
  runRemove,
  runSearch,
  runShow,
  runStatus
} from './commands/library.js'
import { runExport } from './commands/export.js'
import { runHealth } from './commands/health.js'

// Version is read from package.json, or overridden by the environment
const VERSION = process.env.SETUPVAULT_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from this file: src/cli/ in development, dist/cli/ when built
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      return isRecord(pkg) && typeof pkg.version === 'string' ? pkg.version : undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

/**
 * CLI Schema definition
 */
const cliSchema: CLISchema = {
  name: 'setupvault',
  version: VERSION,
  description: 'Document ad-hoc machine changes as rationale-backed records',
  autoShort: false,
  strict: true,
  formatter: setupvaultFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Enable verbose output'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress non-essential output (errors still shown)'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output in JSON format'
    },
    path: {
      type: 'string',
      description: 'Vault root (default: $SETUPVAULT_PATH, then vault.path from config)'
    }
  },

  commands: {
    init: {
      description: 'Create the vault and remember its path',
      options: {
        'dry-run': {
          type: 'boolean',
          default: false,
          description: 'Show what would be created'
        }
      }
    },

    scan: {
      description: 'Run the scanners and queue new changes in the inbox',
      options: {
        'dry-run': {
          type: 'boolean',
          default: false,
          description: 'Scan without queueing anything'
        },
        timeout: {
          type: 'number',
          description: 'Per-scanner timeout in ms (0 = none)'
        }
      }
    },

    scanners: {
      description: 'List the scanners that apply to this machine'
    },

    inbox: {
      description: 'List changes awaiting review'
    },

    snoozed: {
      description: 'List deferred changes'
    },

    accept: {
      description: 'Accept an inbox change into the library',
      positional: [
        { name: 'id', required: true, description: 'Inbox item id' }
      ],
      options: {
        rationale: {
          short: 'r',
          type: 'string',
          description: 'Why this change exists (required)'
        },
        tag: {
          short: 't',
          type: 'string',
          description: 'Comma-separated tags'
        },
        verification: {
          type: 'string',
          description: 'How to check the change still works'
        }
      }
    },

    snooze: {
      description: 'Defer an inbox change',
      positional: [
        { name: 'id', required: true, description: 'Inbox item id' }
      ]
    },

    unsnooze: {
      description: 'Move a snoozed change back to the inbox',
      positional: [
        { name: 'id', required: true, description: 'Snoozed item id' }
      ]
    },

    ignore: {
      description: 'Discard an inbox change for good',
      positional: [
        { name: 'id', required: true, description: 'Inbox item id' }
      ]
    },

    list: {
      description: 'List library records',
      aliases: ['ls'],
      options: {
        status: {
          type: 'string',
          description: 'Filter by status (active, ignored)'
        },
        kind: {
          type: 'string',
          description: 'Filter by entry kind'
        },
        source: {
          type: 'string',
          description: 'Filter by source'
        }
      }
    },

    show: {
      description: 'Show one record',
      positional: [
        { name: 'id', required: true, description: 'Record id' }
      ]
    },

    edit: {
      description: 'Edit the rationale, tags or verification of a record',
      positional: [
        { name: 'id', required: true, description: 'Record id' }
      ],
      options: {
        rationale: {
          short: 'r',
          type: 'string',
          description: 'New rationale'
        },
        tag: {
          short: 't',
          type: 'string',
          description: 'Comma-separated tags (replaces existing)'
        },
        verification: {
          type: 'string',
          description: 'New verification notes (empty to clear)'
        }
      }
    },

    status: {
      description: 'Set a record to active or ignored',
      positional: [
        { name: 'id', required: true, description: 'Record id' },
        { name: 'status', required: true, description: 'active or ignored' }
      ]
    },

    remove: {
      description: 'Delete a record, or a snoozed change with --snoozed',
      aliases: ['rm'],
      positional: [
        { name: 'id', required: true, description: 'Record or snoozed item id' }
      ],
      options: {
        snoozed: {
          type: 'boolean',
          default: false,
          description: 'Remove from the snoozed queue instead of the library'
        }
      }
    },

    capture: {
      description: 'Record a manual change straight into the library',
      positional: [
        { name: 'title', required: true, description: 'What changed' }
      ],
      options: {
        rationale: {
          short: 'r',
          type: 'string',
          description: 'Why this change exists (required)'
        },
        kind: {
          type: 'string',
          description: 'Entry kind (package, config, application, script, other)'
        },
        source: {
          type: 'string',
          description: 'Source label (default: manual)'
        },
        cmd: {
          type: 'string',
          description: 'Command that reproduces the change'
        },
        tag: {
          short: 't',
          type: 'string',
          description: 'Comma-separated tags'
        },
        verification: {
          type: 'string',
          description: 'How to check the change still works'
        }
      }
    },

    search: {
      description: 'Search records by title, tag or rationale',
      positional: [
        { name: 'query', required: false, description: 'Text to look for' }
      ]
    },

    export: {
      description: 'Copy all record files into a directory',
      positional: [
        { name: 'target', required: true, description: 'Target directory' }
      ]
    },

    health: {
      description: 'Show review completeness and queue counts'
    }
  }
}

// =============================================================================
// Parse result narrowing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {}
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === 'string')
}

function optString(opts: Record<string, unknown>, key: string): string | undefined {
  const value = opts[key]
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

function optBoolean(opts: Record<string, unknown>, key: string): boolean {
  return opts[key] === true
}

function optNumber(opts: Record<string, unknown>, key: string): number | undefined {
  const value = opts[key]
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value)
  }
  return undefined
}

/**
 * Convert CommandParseResult to CLIArgs
 */
function toCliArgs(result: CommandParseResult): CLIArgs {
  const opts = readRecord(result.options)
  const pos = readRecord(result.positional)

  // Build the _ array: command + positional args + rest
  const args: string[] = stringList(result.command)
  for (const value of Object.values(pos)) {
    if (typeof value === 'string') {
      args.push(value)
    } else if (Array.isArray(value)) {
      args.push(...stringList(value))
    }
  }
  args.push(...stringList(result.rest))

  return {
    _: args,
    // Global options
    verbose: optBoolean(opts, 'verbose'),
    quiet: optBoolean(opts, 'quiet'),
    json: optBoolean(opts, 'json'),
    'dry-run': optBoolean(opts, 'dry-run'),
    path: optString(opts, 'path'),
    // Command-specific options
    rationale: optString(opts, 'rationale'),
    tag: optString(opts, 'tag'),
    verification: optString(opts, 'verification'),
    kind: optString(opts, 'kind'),
    source: optString(opts, 'source'),
    cmd: optString(opts, 'cmd'),
    status: optString(opts, 'status'),
    snoozed: optBoolean(opts, 'snoozed'),
    timeout: optNumber(opts, 'timeout')
  }
}

/**
 * Build shared context for commands
 */
function buildContext(args: CLIArgs): CommandContext {
  const configPath = getConfigPath()
  const loaded = loadConfig(configPath)
  const config = args.timeout === undefined
    ? loaded
    : { ...loaded, scan: { ...loaded.scan, timeout_ms: args.timeout } }

  const verbose = args.verbose || false
  const vault = new SetupVault({
    config,
    root: args.path ? path.resolve(args.path) : undefined,
    verbose
  })

  ui.setQuiet(args.quiet || false)

  return {
    args,
    config,
    configPath,
    vault,
    verbose,
    dryRun: args['dry-run'] || false,
    jsonOutput: args.json || false
  }
}

// Create CLI instance
const cli = createCLI(cliSchema)

async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs(result)
  const command = stringList(result.command)

  // Handle help first (before error check, so `accept --help` works)
  if (optBoolean(readRecord(result.options), 'help') || command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (optBoolean(readRecord(result.options), 'version')) {
    ui.output(`setupvault v${VERSION}`)
    return
  }

  // Handle errors from parser (after help/version checks)
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(String(error))
    }
    process.exit(1)
  }

  const verbose = args.verbose || false

  try {
    const context = buildContext(args)
    ui.verbose(`vault root: ${context.vault.root}`, verbose)

    switch (command[0]) {
      case 'init':
        await runInit(context)
        break

      case 'scan':
        await runScan(context)
        break

      case 'scanners':
        await runScannerList(context)
        break

      case 'inbox':
        await runInbox(context)
        break

      case 'snoozed':
        await runSnoozedList(context)
        break

      case 'accept':
        await runAccept(context)
        break

      case 'snooze':
        await runSnooze(context)
        break

      case 'unsnooze':
        await runUnsnooze(context)
        break

      case 'ignore':
        await runIgnore(context)
        break

      case 'list':
      case 'ls':
        await runList(context)
        break

      case 'show':
        await runShow(context)
        break

      case 'edit':
        await runEdit(context)
        break

      case 'status':
        await runStatus(context)
        break

      case 'remove':
      case 'rm':
        await runRemove(context)
        break

      case 'capture':
        await runCapture(context)
        break

      case 'search':
        await runSearch(context)
        break

      case 'export':
        await runExport(context)
        break

      case 'health':
        await runHealth(context)
        break

      default:
        print.error(`Unknown command: ${c.command(command[0])}`)
        ui.log(`Run "${c.command('setupvault --help')}" for usage information`)
        process.exit(1)
    }
  } catch (err) {
    if (isSetupVaultError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (verbose && err.context) {
        ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
      }
    } else if (verbose) {
      ui.log(err instanceof Error && err.stack ? err.stack : String(err))
    } else {
      print.error(err instanceof Error ? err.message : String(err))
    }
    process.exit(1)
  }
}

// Run
main().catch((err: unknown) => {
  // Handle uncaught errors at the top level
  print.error(isSetupVaultError(err) ? formatErrorForCli(err) : `Fatal error: ${err instanceof Error ? err.message : String(err)}`)
  process.exit(1)
})
