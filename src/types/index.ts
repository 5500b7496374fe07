/**
 * Shared type definitions for grammar search
 */

// Re-export error types
export {
    GrammarException,
    isGrammarException,
    isSkippableMutationError,
    getSuggestion,
    createGrammarSyntaxError,
    createUndefinedNonterminalError,
    createDuplicateRuleError,
    createParseLimitError,
    createInsufficientNonterminalsError,
    createEmptyBodyError,
    createNoAlternativeError,
    createInvalidConfigError,
    createInvalidExamplesError,
    serializeGrammarError,
} from './errors.js';

export type {
    GrammarErrorCode,
    ErrorSpan,
    GrammarError,
} from './errors.js';

// Re-export grammar types
export { START_RULE } from './grammar.js';
export type {
    TerminalSymbol,
    NonterminalSymbol,
    GrammarSymbol,
    Body,
    Rule,
    SymbolSite,
} from './grammar.js';

// Re-export grammar text types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export search types
export type {
    PopulationEntry,
    Mutant,
    GenerationOutcome,
    SearchResult,
} from './search.js';

// Re-export options
export { DEFAULTS } from './options.js';
export type { MutationName, SearchOptions } from './options.js';
