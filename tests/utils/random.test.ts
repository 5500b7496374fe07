import { Random } from '../../src/utils/random.js';

describe('Random', () => {
    test('seeded sources repeat', () => {
        const a = new Random(17);
        const b = new Random(17);
        const drawsA = Array.from({ length: 5 }, () => a.next());
        const drawsB = Array.from({ length: 5 }, () => b.next());
        expect(drawsA).toEqual(drawsB);
        for (const value of drawsA) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });

    test('seeds are taken modulo 2^32', () => {
        const wide = new Random(2 ** 32 + 5);
        const narrow = new Random(5);
        for (let i = 0; i < 5; i++) {
            expect(wide.next()).toBe(narrow.next());
        }
    });

    test('long seeded runs stay in range', () => {
        const rng = new Random(3);
        for (let i = 0; i < 5000; i++) {
            const value = rng.next();
            expect(value >= 0 && value < 1).toBe(true);
        }
    });

    test('different seeds diverge', () => {
        expect(new Random(1).next()).not.toBe(new Random(2).next());
    });

    test('nextInt stays within inclusive bounds', () => {
        const rng = new Random(4);
        const seen = new Set<number>();
        for (let i = 0; i < 200; i++) seen.add(rng.nextInt(2, 5));
        expect([...seen].sort()).toEqual([2, 3, 4, 5]);
    });

    test('pick rejects an empty list', () => {
        expect(() => new Random(1).pick([])).toThrow(RangeError);
    });

    test('sample draws distinct items', () => {
        const rng = new Random(8);
        const drawn = rng.sample(['a', 'b', 'c', 'd', 'e'], 3);
        expect(drawn).toHaveLength(3);
        expect(new Set(drawn).size).toBe(3);
        expect(() => rng.sample(['a'], 2)).toThrow(RangeError);
    });

    test('weighted skips zero weights', () => {
        const rng = new Random(5);
        for (let i = 0; i < 50; i++) {
            expect(rng.weighted(['a', 'b', 'c'], [0, 2, 0])).toBe('b');
        }
        expect(() => rng.weighted(['a'], [0])).toThrow(RangeError);
    });
});
