/**
 * Output parsers for package manager listings.
 *
 * Each parser turns raw stdout into item names; blank lines never produce
 * an item.
 */

import { slugify } from '../lib/identity.js'

export interface WingetItem {
  name: string
  id: string
}

function lines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0)
}

function firstWord(line: string): string {
  return line.split(/\s+/)[0] ?? ''
}

/**
 * One name per line (brew list, dpkg-query, pacman -Qq, flatpak)
 */
export function parseLineList(output: string): string[] {
  return lines(output)
}

/**
 * `npm list -g --depth=0 --parseable`: the first line is the global prefix,
 * every other line a package directory
 */
export function parseNpmParseable(output: string): string[] {
  return lines(output)
    .slice(1)
    .map(line => {
      const normalized = line.replace(/\\/g, '/')
      const marker = normalized.lastIndexOf('node_modules/')
      if (marker !== -1) {
        return normalized.slice(marker + 'node_modules/'.length)
      }
      return normalized.slice(normalized.lastIndexOf('/') + 1)
    })
    .filter(name => name.length > 0)
}

/**
 * `cargo install --list`: crate lines are flush left, binaries indented
 */
export function parseCargoInstallList(output: string): string[] {
  return output
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0 && !/^\s/.test(line))
    .map(line => firstWord(line.trim()))
    .filter(name => name.length > 0)
}

/**
 * `pip list --format=freeze`
 */
export function parsePipFreeze(output: string): string[] {
  return lines(output)
    .map(line => line.split('==')[0]?.split(' @ ')[0]?.trim() ?? '')
    .filter(name => name.length > 0)
}

/**
 * `dnf list installed` / `yum list installed`: rows start after the
 * "Installed Packages" header; the arch suffix is dropped from the name
 */
export function parseRpmList(output: string): string[] {
  const names: string[] = []
  let started = false
  for (const line of lines(output)) {
    if (line.toLowerCase().startsWith('installed')) {
      started = true
      continue
    }
    if (!started) continue
    const name = firstWord(line).split('.')[0]
    if (name) names.push(name)
  }
  return names
}

/**
 * `snap list`
 */
export function parseSnapList(output: string): string[] {
  return lines(output)
    .filter(line => !line.toLowerCase().startsWith('name'))
    .map(firstWord)
    .filter(name => name.length > 0)
}

/**
 * `choco list -l`
 */
export function parseChocoList(output: string): string[] {
  return lines(output)
    .filter(line => {
      const lower = line.toLowerCase()
      return !lower.startsWith('chocolatey') && !lower.includes('packages installed')
    })
    .map(firstWord)
    .filter(name => name.length > 0)
}

/**
 * `scoop list`
 */
export function parseScoopList(output: string): string[] {
  return lines(output)
    .filter(line => {
      const lower = line.toLowerCase()
      return !lower.startsWith('installed') && !lower.startsWith('name') && !/^-+(\s|$)/.test(line)
    })
    .map(firstWord)
    .filter(name => name.length > 0)
}

/**
 * `defaults domains`: one comma separated line
 */
export function parseDefaultsDomains(output: string): string[] {
  return output
    .split(',')
    .map(domain => domain.trim())
    .filter(domain => domain.length > 0)
}

/**
 * Split a fixed-width table row on runs of two or more spaces
 */
export function splitColumns(line: string): string[] {
  return line
    .trim()
    .split(/\s{2,}/)
    .map(column => column.trim())
    .filter(column => column.length > 0)
}

/**
 * `winget list --source <source>`: rows follow the dashed separator line
 */
export function parseWingetList(output: string): WingetItem[] {
  const items: WingetItem[] = []
  let started = false

  for (const raw of output.split(/\r?\n/)) {
    const line = raw.trimEnd()
    if (!line.trim()) continue
    if (line.includes('---')) {
      started = true
      continue
    }
    const lower = line.toLowerCase()
    if (lower.startsWith('name') && lower.includes('id')) continue
    if (!started) continue

    const [name, id] = splitColumns(line)
    if (!name || id === undefined) continue
    items.push({ name, id })
  }

  return items
}

/**
 * Name used to match an app bundle against a Homebrew cask token
 */
export function normalizeAppName(name: string): string {
  return slugify(name)
}
