/**
 * Tests for record-store.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { RecordStore, findSectionHeading, parseRecord, renderRecord } from '../../src/lib/record-store.js'
import { CorruptRecordError, VaultIOError, VaultNotInitializedError } from '../../src/lib/errors.js'
import type { TrackedChange, VaultRecord } from '../../src/types.js'

function makeRecord(overrides: Partial<VaultRecord> = {}): VaultRecord {
  return {
    id: 'rec-1',
    title: 'jq',
    entryKind: 'package',
    source: 'homebrew',
    command: 'brew install jq',
    systemInfo: { os: 'macos', arch: 'arm64' },
    detectedAt: '2024-05-01T10:00:00.000Z',
    status: 'active',
    tags: ['json'],
    rationale: 'needed for json parsing',
    ...overrides
  }
}

function makeChange(overrides: Partial<TrackedChange> = {}): TrackedChange {
  return {
    id: 'chg-1',
    state: 'inbox',
    source: 'homebrew',
    title: 'wget',
    entryKind: 'package',
    command: 'brew install wget',
    systemInfo: { os: 'macos', arch: 'arm64' },
    observedAt: '2024-05-01T10:00:00.000Z',
    ...overrides
  }
}

const FRONTMATTER = [
  '---',
  'id: rec-1',
  'title: jq',
  'type: package',
  'source: homebrew',
  'cmd: brew install jq',
  'system:',
  '  os: macos',
  '  arch: arm64',
  'detected_at: 2024-05-01T10:00:00.000Z',
  'status: active',
  '---',
  ''
].join('\n')

describe('renderRecord / parseRecord', () => {
  it('should render frontmatter followed by the Markdown sections', () => {
    const content = renderRecord(makeRecord())
    expect(content.startsWith('---\nid: rec-1\n')).toBe(true)
    expect(content.endsWith('---\n\n# Rationale\nneeded for json parsing\n\n# Verification\n\n')).toBe(true)
  })

  it('should read back what it renders', () => {
    const record = makeRecord({ verification: 'jq --version' })
    expect(parseRecord(renderRecord(record), 'a.md')).toEqual(record)
  })

  it('should omit an empty verification section', () => {
    const parsed = parseRecord(renderRecord(makeRecord()), 'a.md')
    expect(parsed.verification).toBeUndefined()
  })

  it('should keep multi-line rationale text', () => {
    const record = makeRecord({ rationale: 'line one\n\nline two' })
    expect(parseRecord(renderRecord(record), 'a.md').rationale).toBe('line one\n\nline two')
  })

  it('should end the rationale at the first verification heading', () => {
    const record = makeRecord({ rationale: 'why', verification: 'step 1\n# Verification\nstep 2' })
    const parsed = parseRecord(renderRecord(record), 'a.md')
    expect(parsed.rationale).toBe('why')
    expect(parsed.verification).toBe('step 1\n# Verification\nstep 2')
  })

  it('should find lines that read as section headings', () => {
    expect(findSectionHeading('step 1\n# Verification  \nstep 2')).toBe('# Verification')
    expect(findSectionHeading('# Rationale')).toBe('# Rationale')
    expect(findSectionHeading('## Verification\n#Rationale')).toBeUndefined()
  })

  it('should accept CRLF line endings and default missing tags', () => {
    const content = `${FRONTMATTER}\n# Rationale\nwhy\n`.replace(/\n/g, '\r\n')
    const record = parseRecord(content, 'a.md')
    expect(record.rationale).toBe('why')
    expect(record.tags).toEqual([])
  })

  it.each([
    ['no frontmatter', '# Rationale\nwhy\n', 'missing frontmatter header'],
    ['unterminated frontmatter', '---\nid: rec-1\n', 'unterminated frontmatter'],
    ['no rationale heading', `${FRONTMATTER}\n# Notes\nwhy\n`, 'missing rationale section'],
    ['blank rationale', `${FRONTMATTER}\n# Rationale\n   \n\n# Verification\n\n`, 'rationale is empty']
  ])('should reject a file with %s', (_label, content, reason) => {
    try {
      parseRecord(content, '/vault/a.md')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(CorruptRecordError)
      if (err instanceof CorruptRecordError) {
        expect(err.path).toBe('/vault/a.md')
        expect(err.reason).toBe(reason)
      }
    }
  })

  it('should reject frontmatter that fails the schema', () => {
    const content = `${FRONTMATTER.replace('status: active', 'status: archived')}\n# Rationale\nwhy\n`
    expect(() => parseRecord(content, 'a.md')).toThrow(/Corrupt file a\.md: status: /)
  })

  it('should reject frontmatter that is not YAML', () => {
    const content = '---\nid: "unclosed\n---\n\n# Rationale\nwhy\n'
    expect(() => parseRecord(content, 'a.md')).toThrow(/invalid YAML/)
  })
})

describe('RecordStore', () => {
  let root: string
  let store: RecordStore

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'setupvault-records-'))
    store = new RecordStore(root)
  })

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true })
  })

  describe('init', () => {
    it('should create the layout once', () => {
      expect(store.isInitialized()).toBe(false)
      expect(() => store.ensureInitialized()).toThrow(VaultNotInitializedError)

      expect(store.init()).toBe(true)
      expect(store.isInitialized()).toBe(true)
      for (const dir of ['packages', 'configs', 'applications', 'scripts', 'other']) {
        expect(fs.statSync(path.join(root, 'entries', dir)).isDirectory()).toBe(true)
      }
      expect(fs.statSync(path.join(root, '.state', 'detectors')).isDirectory()).toBe(true)
      expect(store.readQueue('inbox')).toEqual([])
      expect(store.readQueue('snoozed')).toEqual([])

      expect(store.init()).toBe(false)
    })

    it('should keep existing queues', () => {
      store.init()
      store.writeQueue('inbox', [makeChange()])
      store.init()
      expect(store.readQueue('inbox')).toHaveLength(1)
    })
  })

  describe('records', () => {
    beforeEach(() => {
      store.init()
    })

    it('should name files deterministically by kind, source, title and id', () => {
      const filePath = store.writeRecord(makeRecord())
      expect(filePath).toBe(path.join(root, 'entries', 'packages', 'homebrew', 'homebrew-jq-rec-1.md'))
      expect(store.recordPath(makeRecord())).toBe(filePath)
    })

    it('should fall back to "entry" when the title has no usable characters', () => {
      expect(path.basename(store.recordPath(makeRecord({ title: '***' })))).toBe('homebrew-entry-rec-1.md')
    })

    it('should write and read a record', () => {
      const record = makeRecord({ verification: 'jq --version' })
      const filePath = store.writeRecord(record)
      expect(store.readRecord(filePath)).toEqual(record)
    })

    it('should find a record file by id', async () => {
      const filePath = store.writeRecord(makeRecord())
      expect(await store.findRecordFile('rec-1')).toBe(filePath)
      expect(await store.findRecordFile('rec-2')).toBeUndefined()
    })

    it('should list records and collect corrupt files separately', async () => {
      const good = store.writeRecord(makeRecord())
      const badPath = path.join(root, 'entries', 'other', 'manual', 'manual-broken-rec-9.md')
      fs.mkdirSync(path.dirname(badPath), { recursive: true })
      fs.writeFileSync(badPath, 'not a record')

      const listing = await store.listRecords()
      expect(listing.records).toEqual([{ record: makeRecord(), filePath: good }])
      expect(listing.errors).toHaveLength(1)
      expect(listing.errors[0].path).toBe(badPath)

      await expect(store.loadRecords()).rejects.toThrow(CorruptRecordError)
    })

    it('should delete record files', async () => {
      const filePath = store.writeRecord(makeRecord())
      store.deleteRecordFile(filePath)
      expect(await store.listRecordFiles()).toEqual([])
    })
  })

  describe('queues and tombstones', () => {
    beforeEach(() => {
      store.init()
    })

    it('should round-trip queue items with optional fields', () => {
      const plain = makeChange()
      const withPath = makeChange({
        id: 'chg-2',
        source: 'dotfiles',
        title: '.zshrc',
        entryKind: 'config',
        command: 'open /home/test/.zshrc',
        path: '/home/test/.zshrc',
        tags: ['config']
      })
      store.writeQueue('snoozed', [plain, withPath])
      expect(store.readQueue('snoozed')).toEqual([
        { ...plain, state: 'snoozed' },
        { ...withPath, state: 'snoozed' }
      ])
    })

    it('should store ignored keys sorted and unique', () => {
      expect(store.readIgnored()).toEqual([])
      store.writeIgnored(['npm:b', 'homebrew:a', 'npm:b'])
      expect(store.readIgnored()).toEqual(['homebrew:a', 'npm:b'])
    })

    it('should reject a corrupt queue file', () => {
      fs.writeFileSync(store.queuePath('inbox'), '- id: x\n  title: y\n')
      expect(() => store.readQueue('inbox')).toThrow(CorruptRecordError)
    })
  })

  describe('exportTo', () => {
    it('should copy record files keeping their relative layout', async () => {
      store.init()
      const source = store.writeRecord(makeRecord())
      const target = path.join(root, '..', `${path.basename(root)}-export`)

      try {
        const written = await store.exportTo(target)
        const expected = path.join(target, 'entries', 'packages', 'homebrew', 'homebrew-jq-rec-1.md')
        expect(written).toEqual([expected])
        expect(fs.readFileSync(expected, 'utf-8')).toBe(fs.readFileSync(source, 'utf-8'))
      } finally {
        fs.rmSync(target, { recursive: true, force: true })
      }
    })

    it('should refuse a target that is a file', async () => {
      store.init()
      const file = path.join(root, 'plain.txt')
      fs.writeFileSync(file, 'x')
      await expect(store.exportTo(file)).rejects.toThrow(VaultIOError)
    })

    it('should refuse targets that would put copies under entries/', async () => {
      store.init()
      store.writeRecord(makeRecord())

      await expect(store.exportTo(path.join(root, 'entries', 'backup'))).rejects.toThrow(VaultIOError)
      await expect(store.exportTo(root)).rejects.toThrow(VaultIOError)
      expect(fs.existsSync(path.join(root, 'entries', 'backup'))).toBe(false)

      const { records } = await store.listRecords()
      expect(records.map(entry => entry.record.id)).toEqual(['rec-1'])
    })
  })
})
