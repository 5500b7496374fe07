export type MutationName = 'bubble' | 'coalesce' | 'alternate' | 'repeat';

export interface SearchOptions {
    /** Population capacity */
    populationSize?: number;
    /** Generations to run (fixed count unless stopWhenGoodEnough) */
    generations?: number;
    /** Cascade lengths drawn uniformly per generation */
    cascadeLengths?: readonly number[];
    /** Operators a cascade step draws from */
    mutations?: readonly MutationName[];
    /** Draws allowed per generation when mutations hit unmet preconditions */
    maxAttemptsPerGeneration?: number;
    /** Chart items allowed per membership test */
    maxParseSteps?: number;
    /** Stop as soon as the best grammar accepts every positive and rejects every negative */
    stopWhenGoodEnough?: boolean;
    /** Seed for a reproducible run; Math.random is used when absent */
    seed?: number;
    /**
     * Callback for progress updates.
     * @param progress A number between 0 and 1 (if known) or undefined.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (progress: number | undefined, message: string) => void;
}

export const DEFAULTS = {
    populationSize: 20,
    generations: 30,
    cascadeLengths: [1, 2, 4, 8, 16],
    mutations: ['bubble', 'coalesce', 'alternate', 'repeat'],
    maxAttemptsPerGeneration: 32,
    maxParseSteps: 200000,
    parserCacheSize: 256,
    stopWhenGoodEnough: false,
    coalesceMin: 2,
    coalesceMax: 5,
} as const;
