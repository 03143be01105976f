export type ChartKind = 'bar' | 'heatmap'

export interface ChartBucket {
    label: string
    value: number
}

export interface RenderOptions {
    title: string
    /** File name without extension; derived from the title when omitted */
    fileStem?: string
    /** heatmap only: empty cells before the first bucket in a Monday-first grid */
    leadingBlanks?: number
}

/**
 * Turns bucketed numbers into an image file and returns its path.
 * Fails with RenderError; callers never look at the image itself.
 */
export interface Renderer {
    render(kind: ChartKind, buckets: readonly ChartBucket[], options: RenderOptions): Promise<string>
}
