/**
 * Source of "now". Every lifecycle decision is derived from persisted
 * timestamps compared against this clock, so tests swap in a FakeClock.
 */
export interface Clock {
    now(): Date
}

export class SystemClock implements Clock {
    now(): Date {
        return new Date()
    }
}

export class FakeClock implements Clock {
    private current: Date

    constructor(start: Date | string = '2026-02-01T09:00:00Z') {
        this.current = new Date(start)
    }

    now(): Date {
        return new Date(this.current.getTime())
    }

    set(date: Date | string): void {
        this.current = new Date(date)
    }

    advanceMinutes(minutes: number): void {
        this.current = new Date(this.current.getTime() + minutes * 60_000)
    }
}
