import type { GrammarSymbol } from '../types/grammar.js';
import { createInvalidExamplesError } from '../types/errors.js';
import { Grammar } from './model.js';
import { createRule, nonterminal, terminal } from './symbols.js';

/**
 * Build the naive grammar that accepts exactly the guides: one leaf rule per
 * distinct character, and an entry rule `t0` with one body per guide spelling
 * it out through the leaves.
 *
 * Leaves are numbered `t1, t2, ...` in order of first appearance.
 */
export function buildSeedGrammar(guides: readonly string[]): Grammar {
    if (guides.length === 0) {
        throw createInvalidExamplesError('At least one guide is required to seed the grammar');
    }

    const entry = 't0';
    const grammar = new Grammar(entry);
    const leaves = new Map<string, string>();
    const bodies: GrammarSymbol[][] = [];

    // Iterate by code point so surrogate pairs stay one terminal.
    for (const guide of guides) {
        const body: GrammarSymbol[] = [];
        for (const char of guide) {
            let name = leaves.get(char);
            if (name === undefined) {
                name = `t${leaves.size + 1}`;
                leaves.set(char, name);
                grammar.addOrReplaceRule(createRule(name, [[terminal(char)]]));
            }
            body.push(nonterminal(name));
        }
        bodies.push(body);
    }

    grammar.addOrReplaceRule(createRule(entry, bodies));
    return grammar;
}
