/**
 * SetupVault CLI - Colors Utility
 *
 * Teal palette on ANSI 256, with semantic colors for lifecycle states.
 * Supports NO_COLOR and FORCE_COLOR.
 */

import type { Formatter } from 'cli-args-parser'
import type { RecordStatus, TrackedState } from '../../types.js'
import { formatHealth } from '../../lib/health.js'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stdout.isTTY ?? false
}

const enabled = isColorEnabled()

/**
 * Palette (ANSI 256)
 *
 * - 37:  Teal       (#00AFAF) primary, commands
 * - 44:  Aqua       (#00D7D7) highlights, flags
 * - 30:  Deep teal  (#008787) secondary, positionals
 * - 109: Sage       (#87AFAF) muted, descriptions
 * - 252: Light gray (#D0D0D0) text
 * - 245: Gray       (#8A8A8A) labels
 */
const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  teal: (s: string) => enabled ? `\x1b[38;5;37m${s}\x1b[39m` : s,
  aqua: (s: string) => enabled ? `\x1b[38;5;44m${s}\x1b[39m` : s,
  deepTeal: (s: string) => enabled ? `\x1b[38;5;30m${s}\x1b[39m` : s,
  sage: (s: string) => enabled ? `\x1b[38;5;109m${s}\x1b[39m` : s,

  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,

  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
  green: (s: string) => enabled ? `\x1b[92m${s}\x1b[39m` : s,
  yellow: (s: string) => enabled ? `\x1b[93m${s}\x1b[39m` : s,
}

/**
 * Help/version formatter for cli-args-parser
 */
export const setupvaultFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.teal(s)),
  'version': s => ansi.aqua(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.teal(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.aqua(s),
  'option-type': s => ansi.sage(s),
  'option-default': s => ansi.dim(ansi.sage(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.deepTeal(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.teal(s),
}

export const c = {
  command: (text: string) => ansi.bold(ansi.teal(text)),

  id: (text: string) => ansi.gray(text),
  title: (text: string) => ansi.bold(ansi.white(text)),
  source: (text: string) => ansi.aqua(text),
  kind: (text: string) => ansi.sage(text),
  tag: (text: string) => ansi.deepTeal(text),
  path: (text: string) => ansi.sage(text),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),
  info: (text: string) => ansi.teal(text),

  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  highlight: (text: string) => ansi.bold(ansi.aqua(text)),
  muted: (text: string) => ansi.dim(text),
}

export function colorState(state: TrackedState | RecordStatus): string {
  switch (state) {
    case 'inbox':
      return c.warning(state)
    case 'snoozed':
      return c.muted(state)
    case 'active':
      return c.success(state)
    case 'ignored':
      return c.label(state)
  }
}

// Health percentage: green at 80+, yellow at 50+, red below
export function colorHealth(score: number): string {
  const text = formatHealth(score)
  if (score >= 80) return ansi.bold(ansi.green(text))
  if (score >= 50) return ansi.bold(ansi.yellow(text))
  return ansi.bold(ansi.red(text))
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  info: enabled ? ansi.teal('ℹ') : '[INFO]',
  bullet: enabled ? ansi.sage('•') : '*',
  arrow: enabled ? ansi.teal('→') : '->',
}

// Format a labeled value
export function labeled(label: string, value: string): string {
  return `${c.label(label + ':')} ${value}`
}

export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
  info: (msg: string) => console.error(`${symbols.info} ${c.info(msg)}`),
}
