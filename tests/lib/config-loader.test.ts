/**
 * Tests for config-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import {
  DEFAULT_CONFIG,
  expandEnvVars,
  expandHome,
  getConfigPath,
  loadConfig,
  resolveVaultRoot,
  saveVaultPath
} from '../../src/lib/config-loader.js'
import { InvalidConfigError } from '../../src/lib/errors.js'
import { makeTempDir } from '../helpers.js'

const HOME = '/home/test'

describe('config-loader', () => {
  let dir: string
  let configPath: string

  beforeEach(() => {
    dir = makeTempDir('config')
    configPath = path.join(dir, 'setupvault', 'config.yaml')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  function writeConfig(content: string): void {
    fs.mkdirSync(path.dirname(configPath), { recursive: true })
    fs.writeFileSync(configPath, content)
  }

  describe('expandEnvVars', () => {
    it('should expand all supported forms', () => {
      const env = { A: '1', B: '2' }
      expect(expandEnvVars('${A}-$B-${C:-d}', env)).toBe('1-2-d')
      expect(expandEnvVars('${MISSING}', env)).toBe('')
    })
  })

  describe('expandHome', () => {
    it('should expand a leading tilde only', () => {
      expect(expandHome('~', HOME)).toBe(HOME)
      expect(expandHome('~/vault', HOME)).toBe(path.join(HOME, 'vault'))
      expect(expandHome('/data/~/vault', HOME)).toBe('/data/~/vault')
    })
  })

  describe('getConfigPath', () => {
    it('should prefer $SETUPVAULT_CONFIG', () => {
      expect(getConfigPath({ SETUPVAULT_CONFIG: '/etc/sv.yaml', XDG_CONFIG_HOME: '/xdg' })).toBe('/etc/sv.yaml')
    })

    it('should use $XDG_CONFIG_HOME next', () => {
      expect(getConfigPath({ XDG_CONFIG_HOME: '/xdg', HOME })).toBe('/xdg/setupvault/config.yaml')
    })

    it('should fall back to ~/.config', () => {
      expect(getConfigPath({ HOME })).toBe('/home/test/.config/setupvault/config.yaml')
    })
  })

  describe('loadConfig', () => {
    it('should return expanded defaults when no file exists', () => {
      const config = loadConfig(configPath, { HOME })
      expect(config).toEqual({
        vault: { path: '/home/test/.setupvault' },
        scan: { concurrency: 0, timeout_ms: 60000, disabled: [] },
        dotfiles: {
          paths: ['/home/test/.zshrc', '/home/test/.bashrc', '/home/test/.gitconfig', '/home/test/.vimrc']
        }
      })
    })

    it('should merge file values over defaults', () => {
      writeConfig([
        'vault:',
        '  path: "${VAULT_DIR:-~/vault}"',
        'scan:',
        '  concurrency: 4',
        '  disabled: [snap]',
        'dotfiles:',
        '  paths: [~/.tmux.conf]'
      ].join('\n'))

      const config = loadConfig(configPath, { HOME })
      expect(config.vault.path).toBe('/home/test/vault')
      expect(config.scan).toEqual({ concurrency: 4, timeout_ms: 60000, disabled: ['snap'] })
      expect(config.dotfiles.paths).toEqual(['/home/test/.tmux.conf'])
    })

    it('should coerce numbers expanded from the environment', () => {
      writeConfig('scan:\n  timeout_ms: ${SCAN_TIMEOUT}\n')
      expect(loadConfig(configPath, { HOME, SCAN_TIMEOUT: '500' }).scan.timeout_ms).toBe(500)
    })

    it('should treat an empty file as defaults', () => {
      writeConfig('')
      expect(loadConfig(configPath, { HOME }).scan).toEqual(DEFAULT_CONFIG.scan)
    })

    it('should reject values that fail validation', () => {
      writeConfig('scan:\n  concurrency: -1\n')
      expect(() => loadConfig(configPath, { HOME })).toThrow(InvalidConfigError)
      expect(() => loadConfig(configPath, { HOME })).toThrow(`Invalid config in ${configPath}: scan.concurrency:`)
    })

    it('should reject a file that is not YAML', () => {
      writeConfig('scan: "unclosed\n')
      expect(() => loadConfig(configPath, { HOME })).toThrow(InvalidConfigError)
    })

    it('should reject a top-level list', () => {
      writeConfig('- a\n- b\n')
      expect(() => loadConfig(configPath, { HOME }))
        .toThrow(`Invalid config in ${configPath}: expected a mapping at the top level`)
    })
  })

  describe('resolveVaultRoot', () => {
    it('should prefer $SETUPVAULT_PATH', () => {
      expect(resolveVaultRoot({ vault: { path: '/data/vault' } }, { HOME, SETUPVAULT_PATH: '~/other' }))
        .toBe('/home/test/other')
    })

    it('should use vault.path next', () => {
      expect(resolveVaultRoot({ vault: { path: '/data/vault' } }, { HOME })).toBe('/data/vault')
    })

    it('should default to ~/.setupvault', () => {
      expect(resolveVaultRoot(undefined, { HOME })).toBe('/home/test/.setupvault')
    })
  })

  describe('saveVaultPath', () => {
    it('should create the config file', () => {
      saveVaultPath('/data/vault', configPath)
      expect(parseYaml(fs.readFileSync(configPath, 'utf-8'))).toEqual({ vault: { path: '/data/vault' } })
    })

    it('should keep other keys', () => {
      writeConfig('scan:\n  concurrency: 2\nvault:\n  path: /old\n')
      saveVaultPath('/data/vault', configPath)
      expect(parseYaml(fs.readFileSync(configPath, 'utf-8'))).toEqual({
        scan: { concurrency: 2 },
        vault: { path: '/data/vault' }
      })
    })
  })
})
