import { describe, expect, it } from 'vitest'
import { RenderError } from '../../../src/core/errors.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { SvgRenderer, barChartSvg, escapeXml, heatmapSvg, slugify } from '../../../src/render/svg-renderer.js'
import { silentLogger } from '../../helpers/fixtures.js'

class ReadOnlyFileSystem extends MockFileSystem {
    override async writeText(): Promise<void> {
        throw new Error('EROFS: read-only file system')
    }
}

describe('svg helpers', () => {
    it('escapes XML text', () => {
        expect(escapeXml(`<a & "b" 'c'>`)).toBe('&lt;a &amp; &quot;b&quot; &apos;c&apos;&gt;')
    })

    it('slugifies titles into file stems', () => {
        expect(slugify('Pomodoros on 2026-02-01')).toBe('pomodoros-on-2026-02-01')
        expect(slugify('!!!')).toBe('chart')
    })

    it('scales bars against the largest value', () => {
        const svg = barChartSvg(
            [
                { label: 'Mon', value: 4 },
                { label: 'Tue', value: 2 },
            ],
            'Week'
        )
        expect(svg).toContain('<rect x="30" y="40" width="40" height="160" fill="#e4572e"/>')
        expect(svg).toContain('<rect x="82" y="120" width="40" height="80" fill="#e4572e"/>')
        expect(svg).toContain('<text x="20" y="24" font-size="15" font-weight="bold">Week</text>')
    })

    it('places heatmap cells on a Monday-first grid', () => {
        const svg = heatmapSvg(
            [
                { label: '2026-02-01', value: 1 },
                { label: '2026-02-02', value: 0 },
            ],
            'Feb',
            6
        )
        expect(svg).toContain('<rect x="202" y="56" width="28" height="28" rx="4" fill="#216e39" fill-opacity="1.00">')
        expect(svg).toContain('<rect x="10" y="88" width="28" height="28" rx="4" fill="#ebedf0" fill-opacity="1.00">')
        expect(svg).toContain('<title>2026-02-01: 1</title>')
    })
})

describe('SvgRenderer', () => {
    it('writes the chart under the output directory', async () => {
        const fs = new MockFileSystem()
        const renderer = new SvgRenderer(fs, '/data/reports', silentLogger())

        const filePath = await renderer.render('bar', [{ label: 'completed', value: 3 }], {
            title: 'Today',
            fileStem: 'today-2026-02-01',
        })

        expect(filePath).toBe('/data/reports/today-2026-02-01.svg')
        expect(await fs.exists('/data/reports')).toBe(true)
        expect(fs.getFiles().get(filePath)).toMatch(/^<svg xmlns="http:\/\/www.w3.org\/2000\/svg"/)
    })

    it('derives the file name from the title', async () => {
        const renderer = new SvgRenderer(new MockFileSystem(), '/out', silentLogger())
        const filePath = await renderer.render('heatmap', [{ label: '2026-02-01', value: 0.5 }], { title: 'Weekly focus' })
        expect(filePath).toBe('/out/weekly-focus.svg')
    })

    it('fails with RenderError on unusable input', async () => {
        const renderer = new SvgRenderer(new MockFileSystem(), '/out', silentLogger())
        await expect(renderer.render('bar', [], { title: 'Empty' })).rejects.toThrow('Nothing to render for "Empty"')
        await expect(renderer.render('bar', [{ label: 'x', value: Number.NaN }], { title: 'Bad' })).rejects.toBeInstanceOf(
            RenderError
        )
    })

    it('wraps write failures in RenderError', async () => {
        const renderer = new SvgRenderer(new ReadOnlyFileSystem(), '/out', silentLogger())
        const promise = renderer.render('bar', [{ label: 'x', value: 1 }], { title: 'Today' })
        await expect(promise).rejects.toBeInstanceOf(RenderError)
        await expect(promise).rejects.toThrow('Could not write /out/today.svg: EROFS: read-only file system')
    })
})
