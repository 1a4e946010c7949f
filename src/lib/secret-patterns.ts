/**
 * Secret detection heuristics for files referenced by accepted changes.
 *
 * Advisory only: a match produces a warning, never a refusal.
 */

import fs from 'node:fs'

export const DEFAULT_SECRET_SIGNALS: readonly string[] = [
  'api_key',
  'apikey',
  'secret',
  'token',
  'aws_access_key_id',
  'aws_secret_access_key',
  'github_token',
  'bearer ',
  'private_key',
  '-----begin'
]

export interface SecretWarning {
  path: string
  signals: string[]
  message: string
}

/**
 * Signals found in `content`, matched case-insensitively
 */
export function findSecretSignals(
  content: string,
  signals: readonly string[] = DEFAULT_SECRET_SIGNALS
): string[] {
  const lowered = content.toLowerCase()
  return signals.filter(signal => lowered.includes(signal))
}

export function containsPotentialSecret(content: string): boolean {
  return findSecretSignals(content).length > 0
}

/**
 * Check a regular file for secret signals; missing or unreadable files and
 * directories yield no warning
 */
export function checkFileForSecrets(filePath: string): SecretWarning | undefined {
  let content: string
  try {
    if (!fs.statSync(filePath).isFile()) return undefined
    content = fs.readFileSync(filePath, 'utf-8')
  } catch (err) {
    if (process.env.SETUPVAULT_VERBOSE) {
      console.error(`[setupvault] secret check skipped for ${filePath}: ${String(err)}`)
    }
    return undefined
  }

  const signals = findSecretSignals(content)
  if (signals.length === 0) return undefined

  return {
    path: filePath,
    signals,
    message: `Potential secret detected in ${filePath} (${signals.join(', ')})`
  }
}
