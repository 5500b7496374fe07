import { Grammar } from '../../grammar/model.js';
import { createRule, freshNonterminal, nonterminal } from '../../grammar/symbols.js';
import type { Random } from '../../utils/random.js';
import { pickSite } from './sites.js';

/**
 * Repeat: at a weighted site holding `x`, introduce `R: x | x R` and put
 * `R` in that slot. The single occurrence stays derivable, so the language
 * only grows.
 *
 * @throws EMPTY_BODY when no site exists
 */
export function mutateRepeat(grammar: Grammar, rng: Random): Grammar {
    const site = pickSite(grammar, rng);
    const name = freshNonterminal(grammar.ruleNames());
    const repeater = nonterminal(name);

    const mutant = new Grammar(grammar.entry);
    for (const rule of grammar.getRules()) {
        if (rule.name !== site.rule) {
            mutant.addOrReplaceRule(rule);
            continue;
        }
        mutant.addOrReplaceRule(createRule(
            rule.name,
            rule.bodies.map((body, i) => i === site.bodyIndex
                ? [...body.slice(0, site.position), repeater, ...body.slice(site.position + 1)]
                : body)
        ));
    }
    mutant.addOrReplaceRule(createRule(name, [[site.symbol], [site.symbol, repeater]]));
    return mutant;
}
