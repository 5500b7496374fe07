/**
 * Random source for the search. Seeded runs use mulberry32 so a search can
 * be replayed; unseeded runs fall back to Math.random.
 */
export class Random {
    private state: number;
    private readonly seeded: boolean;

    constructor(seed?: number) {
        this.seeded = seed !== undefined;
        this.state = (seed ?? 0) | 0;
    }

    /** Uniform float in [0, 1). */
    next(): number {
        if (!this.seeded) return Math.random();
        this.state = (this.state + 0x6d2b79f5) | 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /** Uniform integer in [min, max], both inclusive. */
    nextInt(min: number, max: number): number {
        return Math.floor(this.next() * (max - min + 1)) + min;
    }

    pick<T>(items: readonly T[]): T {
        if (items.length === 0) {
            throw new RangeError('Cannot pick from an empty list');
        }
        return items[this.nextInt(0, items.length - 1)];
    }

    /**
     * `count` distinct items, without replacement (partial Fisher-Yates).
     */
    sample<T>(items: readonly T[], count: number): T[] {
        if (count > items.length) {
            throw new RangeError(`Cannot sample ${count} items from ${items.length}`);
        }
        const pool = [...items];
        for (let i = 0; i < count; i++) {
            const j = this.nextInt(i, pool.length - 1);
            [pool[i], pool[j]] = [pool[j], pool[i]];
        }
        return pool.slice(0, count);
    }

    /**
     * Pick an item with probability proportional to its weight.
     */
    weighted<T>(items: readonly T[], weights: readonly number[]): T {
        const total = weights.reduce((sum, w) => sum + w, 0);
        if (items.length === 0 || total <= 0) {
            throw new RangeError('Cannot pick from an empty or zero-weight list');
        }
        let target = this.next() * total;
        for (let i = 0; i < items.length; i++) {
            target -= weights[i];
            if (target < 0) return items[i];
        }
        // Rounding can leave target at zero; fall back to the last weighted item
        for (let i = items.length - 1; i >= 0; i--) {
            if (weights[i] > 0) return items[i];
        }
        return items[items.length - 1];
    }
}
