/**
 * Mutation operators. Each takes a grammar and returns a new one; the input
 * is never modified.
 */

import type { Grammar } from '../../grammar/model.js';
import type { MutationName } from '../../types/options.js';
import type { Random } from '../../utils/random.js';
import { mutateAlternate } from './alternate.js';
import { mutateBubble } from './bubble.js';
import { mutateCoalesce } from './coalesce.js';
import { mutateRepeat } from './repeat.js';

export { mutateAlternate, mutateBubble, mutateCoalesce, mutateRepeat };
export { pickSite } from './sites.js';

export type MutationOperator = (grammar: Grammar, rng: Random) => Grammar;

export const MUTATIONS: Readonly<Record<MutationName, MutationOperator>> = {
    bubble: mutateBubble,
    coalesce: mutateCoalesce,
    alternate: mutateAlternate,
    repeat: mutateRepeat,
};

/**
 * Simplification hook applied to every cascade output before scoring.
 * Currently the identity.
 */
export function minimize(grammar: Grammar): Grammar {
    return grammar;
}
