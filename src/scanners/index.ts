/**
 * Scanner registry
 *
 * Resolves which scanners apply to a platform. Catalogue order is stable;
 * it does not influence scan output, which is always sorted.
 */

import type { Platform, Scanner } from '../types.js'
import type { CommandRunner } from './command.js'
import { runCommand } from './command.js'
import {
  createDesktopApplicationsScanner,
  createDotfilesScanner,
  createMacApplicationsScanner,
  createProgramFilesScanner,
  defaultDesktopDirs,
  defaultDotfilePaths,
  DEFAULT_PROGRAM_FILES_DIRS
} from './files.js'
import { defineCommandScanner, PACKAGE_SCANNERS } from './packages.js'

export interface ScannerOptions {
  /** Dotfiles to watch */
  dotfilePaths?: string[]
  /** Scanner names to leave out */
  disabled?: string[]
  macApplicationDirs?: string[]
  desktopDirs?: string[]
  programFilesDirs?: string[]
  runner?: CommandRunner
}

/**
 * Every scanner this build knows about, for all platforms
 */
export function createScannerCatalogue(options: ScannerOptions = {}): Scanner[] {
  const runner = options.runner ?? runCommand
  return [
    ...PACKAGE_SCANNERS.map(definition => defineCommandScanner(definition, runner)),
    createDotfilesScanner(options.dotfilePaths ?? defaultDotfilePaths()),
    createMacApplicationsScanner(options.macApplicationDirs ?? ['/Applications'], runner),
    createDesktopApplicationsScanner(options.desktopDirs ?? defaultDesktopDirs()),
    createProgramFilesScanner(options.programFilesDirs ?? DEFAULT_PROGRAM_FILES_DIRS)
  ]
}

export function appliesTo(scanner: Scanner, platform: Platform): boolean {
  return !scanner.platforms || scanner.platforms.includes(platform)
}

/**
 * Scanners for `platform`, minus the disabled ones
 */
export function listApplicableScanners(platform: Platform, options: ScannerOptions = {}): Scanner[] {
  const disabled = new Set((options.disabled ?? []).map(name => name.trim().toLowerCase()))
  return createScannerCatalogue(options).filter(
    scanner => appliesTo(scanner, platform) && !disabled.has(scanner.name.toLowerCase())
  )
}

export type { CommandRunner, CommandOptions } from './command.js'
export { runCommand } from './command.js'
export * from './parsers.js'
export { defineCommandScanner, PACKAGE_SCANNERS, toCandidate } from './packages.js'
export type { CommandQuery, CommandScannerDefinition, ListedItem } from './packages.js'
export {
  createDesktopApplicationsScanner,
  createDotfilesScanner,
  createMacApplicationsScanner,
  createProgramFilesScanner,
  defaultDesktopDirs,
  defaultDotfilePaths
} from './files.js'
