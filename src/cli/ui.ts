/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): Pretty UI with tables, colors
 * - Pipe: Clean output, no UI elements, data only to stdout
 */

import { Table, renderToString, getSpinnerConfig } from 'tuiuiu.js'
import type { SpinnerStyle } from 'tuiuiu.js'

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false
const isStderrTTY = process.stderr.isTTY ?? false

let quiet = false

/**
 * Suppress non-essential stderr chatter (errors and warnings still show)
 */
export function setQuiet(value: boolean): void {
  quiet = value
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (isTTY && !quiet) {
    console.error(message)
  }
}

/**
 * Log verbose message (only with verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(`[setupvault] ${message}`)
  }
}

export interface Spinner {
  start: () => void
  update: (text: string) => void
  succeed: (msg?: string) => void
  fail: (msg?: string) => void
}

/**
 * Simple spinner for stderr
 * Uses tuiuiu.js spinner frames but renders imperatively to stderr
 */
export function createSpinner(text: string, style: SpinnerStyle = 'dots'): Spinner {
  if (!isStderrTTY || quiet) {
    // No-op spinner for non-TTY
    return {
      start: () => {},
      update: () => {},
      succeed: (msg?: string) => { if (msg && !quiet) console.error(`✓ ${msg}`) },
      fail: (msg?: string) => { if (msg) console.error(`✗ ${msg}`) }
    }
  }

  const config = getSpinnerConfig(style)
  let frameIndex = 0
  let interval: ReturnType<typeof setInterval> | null = null
  let currentText = text

  const render = () => {
    const frame = config.frames[frameIndex % config.frames.length]
    process.stderr.write(`\r\x1b[K${frame} ${currentText}`)
    frameIndex++
  }

  const clear = () => {
    if (interval) clearInterval(interval)
    interval = null
    process.stderr.write(`\r\x1b[K`)
  }

  return {
    start: () => {
      render()
      interval = setInterval(render, config.interval)
    },
    update: (newText: string) => {
      currentText = newText
    },
    succeed: (msg?: string) => {
      clear()
      console.error(`✓ ${msg || currentText}`)
    },
    fail: (msg?: string) => {
      clear()
      console.error(`✗ ${msg || currentText}`)
    }
  }
}

/**
 * Wrap an async operation with a spinner
 */
export async function withSpinner<T>(
  text: string,
  operation: (spinner: Spinner) => Promise<T>,
  options: { successText?: (result: T) => string; failText?: string } = {}
): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    const result = await operation(spinner)
    spinner.succeed(options.successText?.(result))
    return result
  } catch (err) {
    spinner.fail(options.failText)
    throw err
  }
}

/**
 * Format data as a table using tuiuiu.js
 */
export function formatTable(
  columns: Array<{ key: string; header: string; align?: 'left' | 'center' | 'right' }>,
  data: Array<Record<string, string>>,
  options: { borderStyle?: 'single' | 'round' | 'ascii' | 'none' } = {}
): string {
  if (!isTTY) {
    // Simple tab-separated output for pipes
    const headers = columns.map(c => c.header).join('\t')
    const rows = data.map(row => columns.map(c => row[c.key] ?? '').join('\t'))
    return [headers, ...rows].join('\n')
  }

  // Pretty table for TTY using tuiuiu.js
  const table = Table({
    columns: columns.map(c => ({
      key: c.key,
      header: c.header,
      align: c.align || 'left'
    })),
    data,
    borderStyle: options.borderStyle || 'round',
    showHeader: true
  })

  return renderToString(table)
}

/**
 * Format key-value pairs
 */
export function formatKeyValue(pairs: Array<[string, string]>, separator = ':'): string {
  if (!isTTY) {
    return pairs.map(([k, v]) => `${k}${separator} ${v}`).join('\n')
  }

  const maxKeyLen = Math.max(...pairs.map(([k]) => k.length))
  return pairs
    .map(([k, v]) => `${k.padEnd(maxKeyLen)}${separator} ${v}`)
    .join('\n')
}
