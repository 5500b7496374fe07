import type { Grammar } from '../grammar/model.js';
import type { MutationName } from './options.js';

/**
 * A candidate kept by the search: the grammar, the generation that produced
 * it (0 for the seed), and its fitness.
 */
export interface PopulationEntry {
    readonly grammar: Grammar;
    readonly id: number;
    readonly score: number;
}

/**
 * A cascade output before it is scored.
 */
export interface Mutant {
    grammar: Grammar;
    /** Operators applied, in order */
    steps: MutationName[];
}

export interface GenerationOutcome {
    generation: number;
    /** Id of the parent the admitted or rejected candidate came from; null if every draw was skipped */
    parentId: number | null;
    steps: MutationName[];
    /** Score of the cascade output; null if every draw was skipped */
    score: number | null;
    admitted: boolean;
    /** Population minimum the candidate had to beat */
    threshold: number;
    /** Draws discarded because an operator's precondition failed */
    skippedAttempts: number;
    bestScore: number;
}

export interface SearchResult {
    best: PopulationEntry;
    /** Final population, ascending by score */
    population: readonly PopulationEntry[];
    generationsRun: number;
    stoppedEarly: boolean;
    history: GenerationOutcome[];
}
