import { Grammar } from '../../grammar/model.js';
import { bodyKey, createRule, freshNonterminal, nonterminal, symbolsEqual } from '../../grammar/symbols.js';
import type { Body } from '../../types/grammar.js';
import type { Random } from '../../utils/random.js';
import { replaceFirst, strictSubsequences } from '../../utils/sequences.js';

/**
 * Bubble: extract a strict sub-run shared by the grammar's bodies into a new
 * nonterminal.
 *
 * One sub-run is drawn uniformly from the distinct strict contiguous
 * sub-runs of every body. Each body has its first occurrence replaced by a
 * fresh nonterminal whose only body is the sub-run. The language is
 * unchanged. A grammar with no body longer than one symbol comes back as a
 * structural copy.
 */
export function mutateBubble(grammar: Grammar, rng: Random): Grammar {
    const candidates = new Map<string, Body>();
    for (const rule of grammar.getRules()) {
        for (const body of rule.bodies) {
            for (const run of strictSubsequences(body)) {
                const key = bodyKey(run);
                if (!candidates.has(key)) candidates.set(key, run);
            }
        }
    }
    if (candidates.size === 0) {
        return grammar.clone();
    }

    const extracted = rng.pick([...candidates.values()]);
    const name = freshNonterminal(grammar.ruleNames());
    const replacement = nonterminal(name);

    const mutant = new Grammar(grammar.entry);
    for (const rule of grammar.getRules()) {
        mutant.addOrReplaceRule(createRule(
            rule.name,
            rule.bodies.map(body => replaceFirst(body, extracted, replacement, symbolsEqual))
        ));
    }
    mutant.addOrReplaceRule(createRule(name, [extracted]));
    return mutant;
}
