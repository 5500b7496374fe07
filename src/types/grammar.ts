/**
 * Grammar Types
 *
 * Symbols are a tagged union, so terminals and nonterminals never depend on
 * a string quoting convention to tell them apart. The quoted form only
 * appears when a grammar is rendered to text.
 */

/** Name of the synthetic top-level rule whose single body is `[entry]`. */
export const START_RULE = 'start';

export interface TerminalSymbol {
    readonly kind: 'terminal';
    /** Literal text matched verbatim; never empty. */
    readonly value: string;
}

export interface NonterminalSymbol {
    readonly kind: 'nonterminal';
    readonly name: string;
}

export type GrammarSymbol = TerminalSymbol | NonterminalSymbol;

/** One alternative of a rule: an ordered symbol sequence. */
export type Body = readonly GrammarSymbol[];

/**
 * A named production with its alternatives. Body order does not affect
 * the language but is kept so renderings are reproducible.
 */
export interface Rule {
    readonly name: string;
    readonly bodies: readonly Body[];
}

/**
 * A (rule, body, position) triple addressing one symbol slot.
 */
export interface SymbolSite {
    rule: string;
    bodyIndex: number;
    position: number;
}
