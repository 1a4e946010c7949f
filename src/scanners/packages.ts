/**
 * Package manager scanners
 *
 * Each scanner runs one or more listing commands and maps every listed name
 * to a candidate carrying the command that reinstalls it.
 */

import type { CandidateChange, EntryKind, Platform, ScanContext, Scanner } from '../types.js'
import type { CommandRunner } from './command.js'
import { runCommand } from './command.js'
import {
  parseCargoInstallList,
  parseChocoList,
  parseDefaultsDomains,
  parseLineList,
  parseNpmParseable,
  parsePipFreeze,
  parseRpmList,
  parseScoopList,
  parseSnapList,
  parseWingetList
} from './parsers.js'

// =============================================================================
// Types
// =============================================================================

export interface ListedItem {
  title: string
  command: string
}

export interface CommandQuery {
  command: string
  args: string[]
  entryKind: EntryKind
  parse: (stdout: string) => ListedItem[]
}

export interface CommandScannerDefinition {
  name: string
  platforms?: Platform[]
  queries: CommandQuery[]
}

// =============================================================================
// Builder
// =============================================================================

export function toCandidate(
  context: ScanContext,
  source: string,
  entryKind: EntryKind,
  item: ListedItem,
  path?: string
): CandidateChange {
  const candidate: CandidateChange = {
    source,
    title: item.title,
    entryKind,
    command: item.command,
    systemInfo: { ...context.systemInfo },
    observedAt: context.observedAt,
    tags: [entryKind]
  }
  if (path !== undefined) candidate.path = path
  return candidate
}

/**
 * Build a scanner from listing commands; queries run in order
 */
export function defineCommandScanner(
  definition: CommandScannerDefinition,
  runner: CommandRunner = runCommand
): Scanner {
  return {
    name: definition.name,
    platforms: definition.platforms,
    async scan(context) {
      const candidates: CandidateChange[] = []
      for (const query of definition.queries) {
        const stdout = await runner(query.command, query.args, { signal: context.signal })
        for (const item of query.parse(stdout)) {
          candidates.push(toCandidate(context, definition.name, query.entryKind, item))
        }
      }
      return candidates
    }
  }
}

function names(parse: (stdout: string) => string[], install: (name: string) => string) {
  return (stdout: string): ListedItem[] =>
    parse(stdout).map(title => ({ title, command: install(title) }))
}

function winget(stdout: string): ListedItem[] {
  return parseWingetList(stdout).map(item => ({
    title: item.name,
    command: item.id ? `winget install --id ${item.id}` : `winget install ${item.name}`
  }))
}

// =============================================================================
// Definitions
// =============================================================================

export const PACKAGE_SCANNERS: CommandScannerDefinition[] = [
  {
    name: 'homebrew',
    platforms: ['macos'],
    queries: [
      {
        command: 'brew',
        args: ['list', '--formula'],
        entryKind: 'package',
        parse: names(parseLineList, name => `brew install ${name}`)
      },
      {
        command: 'brew',
        args: ['list', '--cask'],
        entryKind: 'application',
        parse: names(parseLineList, name => `brew install --cask ${name}`)
      }
    ]
  },
  {
    name: 'npm',
    queries: [{
      command: 'npm',
      args: ['list', '-g', '--depth=0', '--parseable'],
      entryKind: 'package',
      parse: names(parseNpmParseable, name => `npm install -g ${name}`)
    }]
  },
  {
    name: 'cargo',
    queries: [{
      command: 'cargo',
      args: ['install', '--list'],
      entryKind: 'package',
      parse: names(parseCargoInstallList, name => `cargo install ${name}`)
    }]
  },
  {
    name: 'pip',
    queries: [{
      command: 'pip',
      args: ['list', '--format=freeze'],
      entryKind: 'package',
      parse: names(parsePipFreeze, name => `pip install ${name}`)
    }]
  },
  {
    name: 'apt',
    platforms: ['linux'],
    queries: [{
      command: 'dpkg-query',
      args: ['-W', '-f=${binary:Package}\n'],
      entryKind: 'package',
      parse: names(parseLineList, name => `sudo apt-get install ${name}`)
    }]
  },
  {
    name: 'dnf',
    platforms: ['linux'],
    queries: [{
      command: 'dnf',
      args: ['list', 'installed'],
      entryKind: 'package',
      parse: names(parseRpmList, name => `sudo dnf install ${name}`)
    }]
  },
  {
    name: 'yum',
    platforms: ['linux'],
    queries: [{
      command: 'yum',
      args: ['list', 'installed'],
      entryKind: 'package',
      parse: names(parseRpmList, name => `sudo yum install ${name}`)
    }]
  },
  {
    name: 'pacman',
    platforms: ['linux'],
    queries: [{
      command: 'pacman',
      args: ['-Qq'],
      entryKind: 'package',
      parse: names(parseLineList, name => `sudo pacman -S ${name}`)
    }]
  },
  {
    name: 'flatpak',
    platforms: ['linux'],
    queries: [{
      command: 'flatpak',
      args: ['list', '--app', '--columns=application'],
      entryKind: 'application',
      parse: names(parseLineList, name => `flatpak install ${name}`)
    }]
  },
  {
    name: 'snap',
    platforms: ['linux'],
    queries: [{
      command: 'snap',
      args: ['list'],
      entryKind: 'application',
      parse: names(parseSnapList, name => `sudo snap install ${name}`)
    }]
  },
  {
    name: 'winget',
    platforms: ['windows'],
    queries: [{
      command: 'winget',
      args: ['list', '--source', 'winget'],
      entryKind: 'application',
      parse: winget
    }]
  },
  {
    name: 'msstore',
    platforms: ['windows'],
    queries: [{
      command: 'winget',
      args: ['list', '--source', 'msstore'],
      entryKind: 'application',
      parse: winget
    }]
  },
  {
    name: 'chocolatey',
    platforms: ['windows'],
    queries: [{
      command: 'choco',
      args: ['list', '-l'],
      entryKind: 'package',
      parse: names(parseChocoList, name => `choco install ${name} -y`)
    }]
  },
  {
    name: 'scoop',
    platforms: ['windows'],
    queries: [{
      command: 'scoop',
      args: ['list'],
      entryKind: 'package',
      parse: names(parseScoopList, name => `scoop install ${name}`)
    }]
  },
  {
    name: 'mac_defaults',
    platforms: ['macos'],
    queries: [{
      command: 'defaults',
      args: ['domains'],
      entryKind: 'config',
      parse: names(parseDefaultsDomains, domain => `defaults read ${domain}`)
    }]
  }
]
