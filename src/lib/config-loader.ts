/**
 * SetupVault Config Loader
 *
 * Loads ~/.config/setupvault/config.yaml, merges it over the defaults and
 * resolves the vault root.
 *
 * Lookup order for the config file:
 *   1. $SETUPVAULT_CONFIG
 *   2. $XDG_CONFIG_HOME/setupvault/config.yaml
 *   3. ~/.config/setupvault/config.yaml
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { z } from 'zod'
import { atomicWriteFile } from './atomic-write.js'
import { InvalidConfigError } from './errors.js'
import { describeIssue } from './schemas.js'

const CONFIG_DIR = 'setupvault'
const CONFIG_FILE = 'config.yaml'
const DEFAULT_VAULT_DIR = '.setupvault'

// =============================================================================
// Types
// =============================================================================

export interface ResolvedConfig {
  vault: { path: string }
  scan: {
    concurrency: number
    timeout_ms: number
    disabled: string[]
  }
  dotfiles: { paths: string[] }
}

const resolvedConfigSchema = z.object({
  vault: z.object({ path: z.string() }),
  scan: z.object({
    concurrency: z.coerce.number().int().min(0),
    timeout_ms: z.coerce.number().int().min(0),
    disabled: z.array(z.string())
  }),
  dotfiles: z.object({ paths: z.array(z.string()) })
})

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  vault: {
    path: `~/${DEFAULT_VAULT_DIR}`
  },
  scan: {
    concurrency: 0,
    timeout_ms: 60000,
    disabled: []
  },
  dotfiles: {
    paths: ['~/.zshrc', '~/.bashrc', '~/.gitconfig', '~/.vimrc']
  }
}

// =============================================================================
// Expansion
// =============================================================================

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item, env))
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item, env)
    }
    return result
  }
  return value
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === '~') return home
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.join(home, filePath.slice(2))
  }
  return filePath
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge plain objects; arrays and scalars from `source` replace
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined && sourceValue !== null) {
      result[key] = sourceValue
    }
  }

  return result
}

function defaultsAsRecord(): Record<string, unknown> {
  return {
    vault: { ...DEFAULT_CONFIG.vault },
    scan: { ...DEFAULT_CONFIG.scan, disabled: [...DEFAULT_CONFIG.scan.disabled] },
    dotfiles: { paths: [...DEFAULT_CONFIG.dotfiles.paths] }
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Path of the config file, whether or not it exists
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SETUPVAULT_CONFIG) {
    return path.resolve(env.SETUPVAULT_CONFIG)
  }
  const base = env.XDG_CONFIG_HOME || path.join(env.HOME || os.homedir(), '.config')
  return path.join(base, CONFIG_DIR, CONFIG_FILE)
}

function readConfigFile(configPath: string, env: NodeJS.ProcessEnv): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new InvalidConfigError(reason, configPath, err)
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidConfigError('expected a mapping at the top level', configPath)
  }

  const expanded = expandEnvVarsInValue(parsed, env)
  return isPlainObject(expanded) ? expanded : {}
}

/**
 * Load configuration merged over the defaults, with `~` expanded in paths
 */
export function loadConfig(
  configPath: string = getConfigPath(),
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const merged = deepMerge(defaultsAsRecord(), readConfigFile(configPath, env))
  const result = resolvedConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new InvalidConfigError(describeIssue(result.error), configPath, result.error)
  }

  const config = result.data
  const home = env.HOME || os.homedir()
  return {
    vault: { path: expandHome(config.vault.path, home) },
    scan: config.scan,
    dotfiles: { paths: config.dotfiles.paths.map(p => expandHome(p, home)) }
  }
}

/**
 * Vault root precedence: $SETUPVAULT_PATH, then `vault.path`, then ~/.setupvault
 */
export function resolveVaultRoot(
  config: Pick<ResolvedConfig, 'vault'> | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  const home = env.HOME || os.homedir()
  if (env.SETUPVAULT_PATH) {
    return path.resolve(expandHome(env.SETUPVAULT_PATH, home))
  }
  if (config?.vault.path) {
    return path.resolve(expandHome(config.vault.path, home))
  }
  return path.join(home, DEFAULT_VAULT_DIR)
}

/**
 * Write `vault.path` into the config file, keeping its other keys
 */
export function saveVaultPath(vaultPath: string, configPath: string = getConfigPath()): void {
  let existing: Record<string, unknown> = {}
  if (fs.existsSync(configPath)) {
    let parsed: unknown
    try {
      parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new InvalidConfigError(reason, configPath, err)
    }
    if (isPlainObject(parsed)) {
      existing = parsed
    }
  }

  const vault = isPlainObject(existing.vault) ? existing.vault : {}
  atomicWriteFile(configPath, stringifyYaml({ ...existing, vault: { ...vault, path: vaultPath } }))
}
