/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { createEarleyEngine } from '../src/engines/earley/index.js';
import type { Grammar } from '../src/grammar/model.js';
import { Random } from '../src/utils/random.js';

/**
 * Random source replaying fixed draws, so a test can steer every choice an
 * operator makes. Fails loudly if the operator draws more than scripted.
 */
export class ScriptedRandom extends Random {
    private readonly values: number[];
    private index = 0;

    constructor(values: number[]) {
        super(0);
        this.values = values;
    }

    next(): number {
        if (this.index >= this.values.length) {
            throw new Error(`ScriptedRandom exhausted after ${this.values.length} draws`);
        }
        return this.values[this.index++];
    }

    get consumed(): number {
        return this.index;
    }
}

const engine = createEarleyEngine();

export function accepts(grammar: Grammar, input: string): boolean {
    return engine.compile(grammar.render()).parse(input);
}

/**
 * Every string over `alphabet` up to `maxLength`, including the empty string.
 */
export function allStrings(alphabet: string[], maxLength: number): string[] {
    const result: string[] = [''];
    let frontier: string[] = [''];
    for (let length = 1; length <= maxLength; length++) {
        const next: string[] = [];
        for (const prefix of frontier) {
            for (const char of alphabet) next.push(prefix + char);
        }
        result.push(...next);
        frontier = next;
    }
    return result;
}

export function language(grammar: Grammar, candidates: string[]): string[] {
    return candidates.filter(input => accepts(grammar, input));
}
