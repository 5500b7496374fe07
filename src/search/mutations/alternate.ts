import type { Grammar } from '../../grammar/model.js';
import { copyBody, symbolKey, symbolsEqual, withBody } from '../../grammar/symbols.js';
import { createNoAlternativeError } from '../../types/errors.js';
import type { Random } from '../../utils/random.js';
import { pickSite } from './sites.js';

/**
 * Alternate: at a weighted site, add a new body to the same rule equal to
 * the chosen body with that one symbol swapped for a different symbol of
 * the alphabet. The original body is kept, so the language only grows.
 *
 * @throws EMPTY_BODY when no site exists
 * @throws NO_ALTERNATIVE when the alphabet has no other symbol
 */
export function mutateAlternate(grammar: Grammar, rng: Random): Grammar {
    const mutant = grammar.clone();
    const site = pickSite(mutant, rng);

    const choices = mutant.alphabet().filter(symbol => !symbolsEqual(symbol, site.symbol));
    if (choices.length === 0) {
        throw createNoAlternativeError(symbolKey(site.symbol));
    }
    const alternative = rng.pick(choices);

    const rule = mutant.getRule(site.rule);
    if (!rule) return mutant;
    const body = copyBody(rule.bodies[site.bodyIndex]);
    body[site.position] = alternative;
    mutant.addOrReplaceRule(withBody(rule, body));
    return mutant;
}
