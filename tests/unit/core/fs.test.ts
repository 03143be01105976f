import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { MockFileSystem, NodeFileSystem } from '../../../src/core/fs.js'

describe('MockFileSystem', () => {
    it('reads back what was written', async () => {
        const fs = new MockFileSystem()
        await fs.writeJSON('/data/a.json', { a: 1 })
        expect(await fs.readJSON('/data/a.json')).toEqual({ a: 1 })
        expect(await fs.exists('/data/a.json')).toBe(true)
    })

    it('rejects reads of missing files', async () => {
        const fs = new MockFileSystem()
        await expect(fs.readText('/missing')).rejects.toThrow('ENOENT: /missing')
    })

    it('tracks directories and removals', async () => {
        const fs = new MockFileSystem()
        await fs.mkdir('/reports')
        fs.setFile('/reports/x.svg', '<svg/>')
        expect(await fs.exists('/reports')).toBe(true)
        await fs.remove('/reports/x.svg')
        expect(fs.getFiles().size).toBe(0)
    })
})

describe('NodeFileSystem', () => {
    let dir: string

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'pomotrack-fs-'))
    })

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true })
    })

    it('writes, reads and removes files on disk', async () => {
        const fs = new NodeFileSystem()
        const nested = path.join(dir, 'a', 'b')
        const file = path.join(nested, 'data.json')

        await fs.mkdir(nested)
        await fs.writeJSON(file, { sessions: [] })

        expect(await fs.exists(file)).toBe(true)
        expect(await fs.readText(file)).toBe('{\n  "sessions": []\n}')
        await fs.remove(file)
        expect(await fs.exists(file)).toBe(false)
    })
})
