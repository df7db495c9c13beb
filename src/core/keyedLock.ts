/**
 * Keyed Lock
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Serializes async work per entity key (an account, the emission state, the
 * buyback state). Tasks holding disjoint keys run concurrently; tasks sharing
 * any key run in call order.
 *
 * All keys of a task are claimed synchronously at call time, so a task only
 * ever waits on tasks that were queued before it. Multi-key tasks cannot
 * deadlock.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    async runExclusive<T>(keys: readonly string[], task: () => Promise<T> | T): Promise<T> {
        const unique = [...new Set(keys)].sort();

        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });

        const predecessors = unique.map((key) => this.tails.get(key) ?? Promise.resolve());
        for (const key of unique) {
            this.tails.set(key, gate);
        }

        try {
            await Promise.all(predecessors);
            return await task();
        } finally {
            release();
            for (const key of unique) {
                if (this.tails.get(key) === gate) {
                    this.tails.delete(key);
                }
            }
        }
    }

    isHeld(key: string): boolean {
        return this.tails.has(key);
    }

    get activeKeyCount(): number {
        return this.tails.size;
    }
}
