import type { PopulationEntry } from '../types/search.js';

/**
 * Bounded population kept sorted ascending by score. Among equal scores,
 * older entries come first, so they are evicted first.
 */
export class Population {
    private readonly capacity: number;
    private entries: PopulationEntry[] = [];

    constructor(capacity: number, initial: PopulationEntry) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Population capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.entries.push(initial);
    }

    get size(): number {
        return this.entries.length;
    }

    /** Score of the lowest-ranked entry: the bar a candidate must clear. */
    get minimumScore(): number {
        return this.entries[0].score;
    }

    best(): PopulationEntry {
        return this.entries[this.entries.length - 1];
    }

    at(index: number): PopulationEntry {
        return this.entries[index];
    }

    snapshot(): readonly PopulationEntry[] {
        return [...this.entries];
    }

    /**
     * Insert `entry` if its score is strictly above the current minimum,
     * after every entry with a score less than or equal to it, then evict
     * from the low end down to capacity.
     */
    tryInsert(entry: PopulationEntry): boolean {
        if (!(entry.score > this.minimumScore)) {
            return false;
        }

        let index = 0;
        while (index < this.entries.length && this.entries[index].score <= entry.score) {
            index++;
        }
        this.entries.splice(index, 0, entry);

        while (this.entries.length > this.capacity) {
            this.entries.shift();
        }
        return true;
    }
}
