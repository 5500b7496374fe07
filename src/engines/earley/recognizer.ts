/**
 * Earley Recognizer
 *
 * Chart recognizer for arbitrary context-free grammars: left and right
 * recursion, ambiguity, empty bodies (Aycock-Horspool nullable prediction)
 * and multi-character terminals. Only membership is computed; no parse
 * forest is built.
 *
 * Every chart item added counts as one step. Exceeding the budget throws
 * PARSE_LIMIT so a degenerate grammar cannot stall a search.
 */

import { START_RULE } from '../../types/grammar.js';
import type { Rule } from '../../types/grammar.js';
import { createParseLimitError, createUndefinedNonterminalError } from '../../types/errors.js';
import type { CompiledGrammar } from '../interface.js';

type CompiledSymbol =
    | { kind: 'terminal'; value: string }
    | { kind: 'nonterminal'; id: number };

interface Production {
    lhs: number;
    rhs: CompiledSymbol[];
}

interface Item {
    production: number;
    dot: number;
    origin: number;
}

export interface RecognizerOptions {
    maxSteps: number;
    startSymbol?: string;
}

export class EarleyRecognizer implements CompiledGrammar {
    private readonly productions: Production[] = [];
    /** Production indices per nonterminal id */
    private readonly byLhs: number[][] = [];
    private readonly nullable: boolean[] = [];
    private readonly start: number;
    private readonly maxSteps: number;

    constructor(rules: readonly Rule[], options: RecognizerOptions) {
        this.maxSteps = options.maxSteps;

        const ids = new Map<string, number>();
        rules.forEach((rule, i) => ids.set(rule.name, i));

        const startSymbol = options.startSymbol ?? START_RULE;
        const start = ids.get(startSymbol);
        if (start === undefined) {
            throw createUndefinedNonterminalError(startSymbol);
        }
        this.start = start;

        rules.forEach((rule, lhs) => {
            this.byLhs.push([]);
            for (const body of rule.bodies) {
                const rhs = body.map((symbol): CompiledSymbol => {
                    if (symbol.kind === 'terminal') {
                        return { kind: 'terminal', value: symbol.value };
                    }
                    const id = ids.get(symbol.name);
                    if (id === undefined) {
                        throw createUndefinedNonterminalError(symbol.name, rule.name);
                    }
                    return { kind: 'nonterminal', id };
                });
                this.byLhs[lhs].push(this.productions.length);
                this.productions.push({ lhs, rhs });
            }
        });

        this.computeNullable(rules.length);
    }

    private computeNullable(count: number): void {
        for (let i = 0; i < count; i++) this.nullable.push(false);
        let changed = true;
        while (changed) {
            changed = false;
            for (const production of this.productions) {
                if (this.nullable[production.lhs]) continue;
                const allNullable = production.rhs.every(
                    symbol => symbol.kind === 'nonterminal' && this.nullable[symbol.id]
                );
                if (allNullable) {
                    this.nullable[production.lhs] = true;
                    changed = true;
                }
            }
        }
    }

    parse(input: string): boolean {
        const n = input.length;
        const chart: Item[][] = [];
        const seen: Set<string>[] = [];
        // Items in each set waiting on a nonterminal, keyed by its id
        const waiting: Map<number, Item[]>[] = [];
        for (let i = 0; i <= n; i++) {
            chart.push([]);
            seen.push(new Set());
            waiting.push(new Map());
        }

        let steps = 0;
        const add = (set: number, item: Item): void => {
            const key = `${item.production}.${item.dot}.${item.origin}`;
            if (seen[set].has(key)) return;
            if (++steps > this.maxSteps) {
                throw createParseLimitError(this.maxSteps, input);
            }
            seen[set].add(key);
            chart[set].push(item);

            const next = this.productions[item.production].rhs[item.dot];
            if (next !== undefined && next.kind === 'nonterminal') {
                const list = waiting[set].get(next.id);
                if (list) {
                    list.push(item);
                } else {
                    waiting[set].set(next.id, [item]);
                }
            }
        };

        for (const production of this.byLhs[this.start]) {
            add(0, { production, dot: 0, origin: 0 });
        }

        for (let i = 0; i <= n; i++) {
            const set = chart[i];
            // The set grows while it is processed
            for (let k = 0; k < set.length; k++) {
                const item = set[k];
                const production = this.productions[item.production];
                const next = production.rhs[item.dot];

                if (next === undefined) {
                    // Complete
                    const parents = waiting[item.origin].get(production.lhs) ?? [];
                    for (let p = 0; p < parents.length; p++) {
                        const parent = parents[p];
                        add(i, { production: parent.production, dot: parent.dot + 1, origin: parent.origin });
                    }
                } else if (next.kind === 'nonterminal') {
                    // Predict
                    for (const candidate of this.byLhs[next.id]) {
                        add(i, { production: candidate, dot: 0, origin: i });
                    }
                    if (this.nullable[next.id]) {
                        add(i, { production: item.production, dot: item.dot + 1, origin: item.origin });
                    }
                } else if (input.startsWith(next.value, i)) {
                    // Scan
                    add(i + next.value.length, { production: item.production, dot: item.dot + 1, origin: item.origin });
                }
            }
        }

        return chart[n].some(item =>
            item.origin === 0 &&
            this.productions[item.production].lhs === this.start &&
            item.dot === this.productions[item.production].rhs.length
        );
    }
}
