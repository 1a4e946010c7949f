/**
 * Tests for client.ts
 * Drives the full scan → diff → review → library loop against a temp vault
 */

import fs from 'node:fs'
import path from 'node:path'
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { SetupVault, createVault } from '../src/client.js'
import { LifecycleController } from '../src/domain/lifecycle.js'
import { DEFAULT_CONFIG } from '../src/lib/config-loader.js'
import type { ResolvedConfig } from '../src/lib/config-loader.js'
import { NotFoundError, VaultNotInitializedError } from '../src/lib/errors.js'
import type { Scanner } from '../src/types.js'
import { failingScanner, fakeScanner, makeTempDir } from './helpers.js'

describe('SetupVault', () => {
  let tempDir: string
  let root: string
  let nextId: number

  function createTestVault(scanners: Scanner[], config: ResolvedConfig = DEFAULT_CONFIG): SetupVault {
    const vault = new SetupVault({
      root,
      config,
      scanners,
      platform: 'macos',
      generateId: () => `id-${++nextId}`,
      now: () => new Date('2024-06-01T00:00:00.000Z')
    })
    vault.init()
    return vault
  }

  beforeEach(() => {
    tempDir = makeTempDir('client')
    root = path.join(tempDir, 'vault')
    nextId = 0
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('init', () => {
    it('should report whether the vault was created', () => {
      const vault = createVault({ root, scanners: [] })
      expect(vault.isInitialized()).toBe(false)
      expect(vault.init()).toBe(true)
      expect(vault.isInitialized()).toBe(true)
      expect(vault.init()).toBe(false)
    })

    it('should refuse to open an uninitialized vault', async () => {
      const vault = createVault({ root, scanners: [] })
      await expect(vault.inbox()).rejects.toBeInstanceOf(VaultNotInitializedError)
    })
  })

  describe('open', () => {
    it('should share one controller between concurrent first calls', async () => {
      const openSpy = vi.spyOn(LifecycleController, 'open')
      const vault = createTestVault([])

      const titles = Array.from({ length: 10 }, (_, i) => `tool-${i}`)
      await Promise.all(titles.map(title => vault.ingest({
        source: 'manual',
        title,
        entryKind: 'package',
        command: '',
        systemInfo: { os: 'macos', arch: 'arm64' },
        observedAt: '2024-05-01T10:00:00.000Z'
      })))

      expect(openSpy).toHaveBeenCalledTimes(1)
      expect(await vault.inbox()).toHaveLength(10)
      const reopened = createVault({ root, scanners: [] })
      expect(await reopened.inbox()).toHaveLength(10)
    })

    it('should retry opening after a failure', async () => {
      const vault = createVault({ root, scanners: [] })
      await expect(vault.inbox()).rejects.toBeInstanceOf(VaultNotInitializedError)
      vault.init()
      expect(await vault.inbox()).toEqual([])
    })
  })

  describe('refresh', () => {
    it('should run the full review loop', async () => {
      const brew = fakeScanner('brew', ['jq'])
      const vault = createTestVault([brew])

      const first = await vault.refresh()
      expect(first.scan.sources).toEqual(['brew'])
      expect(first.ingest.ingested).toHaveLength(1)
      const [jq] = await vault.inbox()
      expect(jq).toMatchObject({ id: 'id-1', source: 'brew', title: 'jq', command: 'brew install jq' })

      const accepted = await vault.accept('id-1', { rationale: 'debug' })
      expect(accepted.record.status).toBe('active')
      expect(accepted.record.rationale).toBe('debug')
      expect(await vault.inbox()).toEqual([])
      expect((await vault.library()).map(record => record.id)).toEqual(['id-1'])
      expect(await vault.health()).toBe(100)

      const second = await vault.refresh()
      expect(second.ingest.ingested).toEqual([])
      expect(await vault.inbox()).toEqual([])

      brew.titles = []
      await vault.refresh()
      expect(await vault.inbox()).toEqual([])
      expect((await vault.library()).map(record => record.title)).toEqual(['jq'])
    })

    it('should not resurrect an accepted item after it disappears and returns', async () => {
      const brew = fakeScanner('brew', ['jq'])
      const vault = createTestVault([brew])

      await vault.refresh()
      await vault.accept('id-1', { rationale: 'debug' })

      brew.titles = []
      await vault.refresh()
      brew.titles = ['jq']
      const result = await vault.refresh()

      expect(result.ingest.ingested).toEqual([])
      expect(result.ingest.discarded).toBe(1)
      expect(await vault.inbox()).toEqual([])
    })

    it('should keep going when one scanner fails', async () => {
      const vault = createTestVault([
        fakeScanner('brew', ['jq']),
        failingScanner('npm'),
        fakeScanner('cargo', ['ripgrep'])
      ])

      const result = await vault.refresh()

      expect(result.scan.errors).toHaveLength(1)
      expect(result.scan.errors[0]?.message).toBe('Scanner "npm" failed: tool crashed')
      expect((await vault.inbox()).map(change => `${change.source}:${change.title}`))
        .toEqual(['brew:jq', 'cargo:ripgrep'])
    })

    it('should skip scanners disabled in config', async () => {
      const config: ResolvedConfig = {
        ...DEFAULT_CONFIG,
        scan: { ...DEFAULT_CONFIG.scan, disabled: ['NPM'] }
      }
      const npm = fakeScanner('npm', ['typescript'])
      const vault = createTestVault([fakeScanner('brew', ['jq']), npm], config)

      expect(vault.listApplicableScanners().map(scanner => scanner.name)).toEqual(['brew'])
      await vault.refresh()
      expect(npm.calls).toBe(0)
    })

    it('should queue each item once across runs', async () => {
      const vault = createTestVault([fakeScanner('brew', ['jq', 'wget'])])

      await vault.refresh()
      await vault.refresh()

      expect((await vault.inbox()).map(change => change.title)).toEqual(['jq', 'wget'])
    })
  })

  describe('queues', () => {
    it('should not queue an ignored item again', async () => {
      const brew = fakeScanner('brew', ['jq'])
      const vault = createTestVault([brew])

      await vault.refresh()
      await vault.ignore('id-1')

      brew.titles = []
      await vault.refresh()
      brew.titles = ['jq']
      await vault.refresh()

      expect(await vault.inbox()).toEqual([])
    })

    it('should move items between inbox and snoozed', async () => {
      const vault = createTestVault([fakeScanner('brew', ['jq'])])
      await vault.refresh()

      await vault.snooze('id-1')
      expect(await vault.inbox()).toEqual([])
      expect((await vault.snoozed()).map(change => change.id)).toEqual(['id-1'])

      await vault.unsnooze('id-1')
      expect((await vault.inbox()).map(change => change.id)).toEqual(['id-1'])
      expect(await vault.snoozed()).toEqual([])
    })
  })

  describe('library', () => {
    it('should read records back from disk', async () => {
      const vault = createTestVault([fakeScanner('brew', ['jq'])])
      await vault.refresh()
      await vault.accept('id-1', { rationale: 'json in scripts', tags: ['CLI', 'json'] })

      const record = await vault.getRecord('id-1')
      expect(record.title).toBe('jq')
      expect(record.tags).toEqual(['cli', 'json'])

      const reopened = createVault({ root, scanners: [] })
      expect((await reopened.getRecord('id-1')).rationale).toBe('json in scripts')
    })

    it('should throw NotFoundError for an unknown id', async () => {
      const vault = createTestVault([])
      await expect(vault.getRecord('missing')).rejects.toBeInstanceOf(NotFoundError)
    })

    it('should search titles, tags and rationale', async () => {
      const vault = createTestVault([fakeScanner('brew', ['jq', 'wget'])])
      await vault.refresh()
      await vault.accept('id-1', { rationale: 'parse json', tags: ['cli'] })
      await vault.accept('id-2', { rationale: 'downloads', tags: ['network'] })

      expect((await vault.search('JSON')).map(record => record.title)).toEqual(['jq'])
      expect((await vault.search('network')).map(record => record.title)).toEqual(['wget'])
      expect((await vault.search('wge')).map(record => record.title)).toEqual(['wget'])
      expect(await vault.search('nothing')).toEqual([])
      expect(await vault.search('  ')).toHaveLength(2)
    })

    it('should count records and queues in stats', async () => {
      const vault = createTestVault([fakeScanner('brew', ['jq', 'wget', 'tree'])])
      await vault.refresh()
      await vault.accept('id-1', { rationale: 'json' })
      await vault.snooze('id-2')

      expect(await vault.stats()).toEqual({
        inbox: 1,
        snoozed: 1,
        active: 1,
        ignored: 0,
        library: 1,
        health: 50
      })
    })

    it('should export record files unchanged', async () => {
      const vault = createTestVault([fakeScanner('brew', ['jq'])])
      await vault.refresh()
      const { filePath } = await vault.accept('id-1', { rationale: 'json' })

      const target = path.join(tempDir, 'export')
      const written = await vault.export(target)

      expect(written).toEqual([path.join(target, path.relative(root, filePath))])
      expect(fs.readFileSync(written[0] ?? '', 'utf-8')).toBe(fs.readFileSync(filePath, 'utf-8'))
    })
  })
})
