/**
 * Sequence helpers for body rewriting.
 */

/**
 * All strict contiguous sub-runs of `items`: length 1 through length-1.
 * Empty for sequences shorter than two.
 */
export function* strictSubsequences<T>(items: readonly T[]): Generator<T[]> {
    for (let length = 1; length < items.length; length++) {
        for (let start = 0; start + length <= items.length; start++) {
            yield items.slice(start, start + length);
        }
    }
}

/**
 * Index of the first contiguous occurrence of `pattern` in `items`, or -1.
 */
export function findSubsequence<T>(
    items: readonly T[],
    pattern: readonly T[],
    equals: (a: T, b: T) => boolean
): number {
    if (pattern.length === 0) return -1;
    for (let start = 0; start + pattern.length <= items.length; start++) {
        let matched = true;
        for (let k = 0; k < pattern.length; k++) {
            if (!equals(items[start + k], pattern[k])) {
                matched = false;
                break;
            }
        }
        if (matched) return start;
    }
    return -1;
}

/**
 * Copy of `items` with its first occurrence of `pattern` replaced by
 * `replacement`; an unchanged copy if there is none.
 */
export function replaceFirst<T>(
    items: readonly T[],
    pattern: readonly T[],
    replacement: T,
    equals: (a: T, b: T) => boolean
): T[] {
    const start = findSubsequence(items, pattern, equals);
    if (start < 0) return [...items];
    return [...items.slice(0, start), replacement, ...items.slice(start + pattern.length)];
}
