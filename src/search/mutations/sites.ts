import type { Grammar } from '../../grammar/model.js';
import type { GrammarSymbol, SymbolSite } from '../../types/grammar.js';
import { createEmptyBodyError } from '../../types/errors.js';
import type { Random } from '../../utils/random.js';

/**
 * Pick a (rule, body, position) site. A rule is chosen with probability
 * proportional to its number of bodies, then a body and a position
 * uniformly. The `start` rule is never chosen.
 *
 * @throws EMPTY_BODY when there is no body, or the chosen body is empty
 */
export function pickSite(grammar: Grammar, rng: Random): SymbolSite & { symbol: GrammarSymbol } {
    const names = grammar.nonterminals();
    const weights = names.map(name => grammar.getRule(name)?.bodies.length ?? 0);
    if (weights.every(w => w === 0)) {
        throw createEmptyBodyError();
    }

    const rule = rng.weighted(names, weights);
    const bodies = grammar.getRule(rule)?.bodies ?? [];
    const bodyIndex = rng.nextInt(0, bodies.length - 1);
    const body = bodies[bodyIndex];
    if (body.length === 0) {
        throw createEmptyBodyError(rule);
    }
    const position = rng.nextInt(0, body.length - 1);
    return { rule, bodyIndex, position, symbol: body[position] };
}
