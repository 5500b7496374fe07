/**
 * Grammar Search - Library Entry Point
 *
 * Exports the grammar model, the Earley engine and the search core for use
 * in other projects. Nothing here writes to stdout.
 */

// Grammar model
export * from './grammar/index.js';

// Engines
export { EarleyEngine, EarleyRecognizer, createEarleyEngine } from './engines/earley/index.js';
export type { EarleyEngineOptions, RecognizerOptions } from './engines/earley/index.js';
export type { GrammarEngine, CompiledGrammar, EngineCompileOptions } from './engines/interface.js';

// Search
export { SearchEngine, search } from './search/engine.js';
export { Scorer, isGoodEnough } from './search/scorer.js';
export type { ScoreBreakdown } from './search/scorer.js';
export { Population } from './search/population.js';
export {
    MUTATIONS,
    minimize,
    mutateBubble,
    mutateCoalesce,
    mutateAlternate,
    mutateRepeat,
    pickSite,
} from './search/mutations/index.js';
export type { MutationOperator } from './search/mutations/index.js';

// Configuration
export { loadProblem, parseProblem, resolveSearchSettings, optionsFromEnv } from './config.js';
export type { Problem, SearchSettings } from './config.js';

// Types and Interfaces
export * from './types/index.js';

// Utilities
export { Random } from './utils/random.js';
