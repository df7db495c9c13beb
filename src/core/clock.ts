/**
 * Clock abstraction. Timestamps are integer seconds.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000),
};

/**
 * Deterministic clock for simulations and tests.
 */
export class ManualClock implements Clock {
    constructor(private current: number = 0) {}

    now(): number {
        return this.current;
    }

    set(timestamp: number): void {
        this.current = timestamp;
    }

    advance(seconds: number): number {
        this.current += seconds;
        return this.current;
    }
}
