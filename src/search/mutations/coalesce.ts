import { Grammar } from '../../grammar/model.js';
import { createRule, freshNonterminal, nonterminal } from '../../grammar/symbols.js';
import type { Body } from '../../types/grammar.js';
import { createInsufficientNonterminalsError } from '../../types/errors.js';
import { DEFAULTS } from '../../types/options.js';
import type { Random } from '../../utils/random.js';

/**
 * Coalesce: merge 2 to 5 nonterminals into one fresh nonterminal.
 *
 * Every reference to a merged name is rewritten to the fresh name, whose
 * bodies are all the merged rules' original bodies (not de-duplicated).
 * The merged rules stay defined, since those original bodies may still
 * reference them. Everything derivable before stays derivable; sites that
 * named different merged rules become interchangeable.
 *
 * @throws INSUFFICIENT_NONTERMINALS with fewer than two candidates
 */
export function mutateCoalesce(grammar: Grammar, rng: Random): Grammar {
    const names = grammar.nonterminals();
    if (names.length < DEFAULTS.coalesceMin) {
        throw createInsufficientNonterminalsError(names.length, DEFAULTS.coalesceMin);
    }

    const count = rng.nextInt(DEFAULTS.coalesceMin, Math.min(DEFAULTS.coalesceMax, names.length));
    const merged = new Set(rng.sample(names, count));
    const name = freshNonterminal(grammar.ruleNames());
    const replacement = nonterminal(name);

    const mutant = new Grammar(grammar.entry);
    const bodies: Body[] = [];
    for (const rule of grammar.getRules()) {
        mutant.addOrReplaceRule(createRule(
            rule.name,
            rule.bodies.map(body => body.map(symbol =>
                symbol.kind === 'nonterminal' && merged.has(symbol.name) ? replacement : symbol
            ))
        ));
        if (merged.has(rule.name)) {
            bodies.push(...rule.bodies);
        }
    }
    mutant.addOrReplaceRule(createRule(name, bodies));
    return mutant;
}
