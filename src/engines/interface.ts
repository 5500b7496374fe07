/**
 * Grammar Engine Interface
 *
 * Abstract interface for the grammar-execution backend used by the scorer.
 * An engine turns rendered grammar text into a recognizer and answers
 * membership queries against it.
 */

/**
 * Options for compiling grammar text
 */
export interface EngineCompileOptions {
    /** Maximum chart items per membership test before giving up */
    maxSteps?: number;
    /** Rule the recognizer derives from (default: 'start') */
    startSymbol?: string;
}

/**
 * A compiled grammar ready for membership tests.
 */
export interface CompiledGrammar {
    /**
     * Whether `input` is in the grammar's language.
     * @throws GrammarException with code PARSE_LIMIT when the step budget is exhausted
     */
    parse(input: string): boolean;
}

/**
 * Abstract grammar engine interface.
 * All engine backends must implement this interface.
 */
export interface GrammarEngine {
    /** Unique name of the engine */
    readonly name: string;

    /**
     * Compile grammar text.
     * @throws GrammarException for malformed text or undefined nonterminals
     */
    compile(text: string, options?: EngineCompileOptions): CompiledGrammar;
}
