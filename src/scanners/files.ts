/**
 * Filesystem scanners: dotfiles and installed applications
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { glob } from 'tinyglobby'
import type { CandidateChange, Scanner } from '../types.js'
import type { CommandRunner } from './command.js'
import { runCommand } from './command.js'
import { toCandidate } from './packages.js'
import { normalizeAppName, parseLineList } from './parsers.js'

// =============================================================================
// Dotfiles
// =============================================================================

export function defaultDotfilePaths(home: string = os.homedir()): string[] {
  return ['.zshrc', '.bashrc', '.gitconfig', '.vimrc'].map(name => path.join(home, name))
}

/**
 * Reports each configured dotfile that exists
 */
export function createDotfilesScanner(paths: readonly string[] = defaultDotfilePaths()): Scanner {
  return {
    name: 'dotfiles',
    platforms: ['macos', 'linux'],
    async scan(context) {
      const candidates: CandidateChange[] = []
      for (const filePath of paths) {
        if (!fs.existsSync(filePath)) continue
        candidates.push(toCandidate(
          context,
          'dotfiles',
          'config',
          { title: path.basename(filePath), command: `open ${filePath}` },
          filePath
        ))
      }
      return candidates
    }
  }
}

// =============================================================================
// Applications
// =============================================================================

/**
 * App bundles in /Applications, minus those Homebrew installed as casks
 */
export function createMacApplicationsScanner(
  appDirs: readonly string[] = ['/Applications'],
  runner: CommandRunner = runCommand
): Scanner {
  return {
    name: 'applications',
    platforms: ['macos'],
    async scan(context) {
      const casks = new Set(
        parseLineList(await runner('brew', ['list', '--cask'], { signal: context.signal })).map(normalizeAppName)
      )

      const candidates: CandidateChange[] = []
      for (const dir of appDirs) {
        if (!fs.existsSync(dir)) continue
        const bundles = await glob('*.app', { cwd: dir, onlyDirectories: true, absolute: true })
        for (const bundle of bundles) {
          const bundlePath = bundle.replace(/[\\/]+$/, '')
          const title = path.basename(bundlePath, '.app')
          if (casks.has(normalizeAppName(title))) continue
          candidates.push(toCandidate(
            context,
            'applications',
            'application',
            { title, command: `open "${bundlePath}"` },
            bundlePath
          ))
        }
      }
      return candidates
    }
  }
}

export function defaultDesktopDirs(home: string = os.homedir()): string[] {
  return ['/usr/share/applications', path.join(home, '.local', 'share', 'applications')]
}

/**
 * Desktop entries (*.desktop) from the system and user application dirs
 */
export function createDesktopApplicationsScanner(
  dirs: readonly string[] = defaultDesktopDirs()
): Scanner {
  return {
    name: 'applications',
    platforms: ['linux'],
    async scan(context) {
      const candidates: CandidateChange[] = []
      for (const dir of dirs) {
        if (!fs.existsSync(dir)) continue
        const entries = await glob('*.desktop', { cwd: dir, absolute: true })
        for (const entry of entries) {
          const fileName = path.basename(entry)
          candidates.push(toCandidate(
            context,
            'applications',
            'application',
            { title: path.basename(entry, '.desktop'), command: `gtk-launch ${fileName}` },
            entry
          ))
        }
      }
      return candidates
    }
  }
}

export const DEFAULT_PROGRAM_FILES_DIRS = ['C:\\Program Files', 'C:\\Program Files (x86)']

/**
 * Top-level folders under Program Files
 */
export function createProgramFilesScanner(
  roots: readonly string[] = DEFAULT_PROGRAM_FILES_DIRS
): Scanner {
  return {
    name: 'applications',
    platforms: ['windows'],
    async scan(context) {
      const candidates: CandidateChange[] = []
      for (const root of roots) {
        if (!fs.existsSync(root)) continue
        const folders = await glob('*', { cwd: root, onlyDirectories: true, absolute: true })
        for (const folder of folders) {
          const folderPath = folder.replace(/[\\/]+$/, '')
          candidates.push(toCandidate(
            context,
            'applications',
            'application',
            { title: path.basename(folderPath), command: `start "" "${folderPath}"` },
            folderPath
          ))
        }
      }
      return candidates
    }
  }
}
