import type { Body, GrammarSymbol, NonterminalSymbol, Rule, TerminalSymbol } from '../types/grammar.js';

export function terminal(value: string): TerminalSymbol {
    return { kind: 'terminal', value };
}

export function nonterminal(name: string): NonterminalSymbol {
    return { kind: 'nonterminal', name };
}

/**
 * Text form of a symbol: terminals as JSON string literals, nonterminals bare.
 * Two symbols are equal iff their keys are equal.
 */
export function symbolKey(symbol: GrammarSymbol): string {
    return symbol.kind === 'terminal' ? JSON.stringify(symbol.value) : symbol.name;
}

export function symbolsEqual(a: GrammarSymbol, b: GrammarSymbol): boolean {
    if (a.kind === 'terminal') {
        return b.kind === 'terminal' && a.value === b.value;
    }
    return b.kind === 'nonterminal' && a.name === b.name;
}

export function bodyKey(body: Body): string {
    return body.map(symbolKey).join(' ');
}

export function copyBody(body: Body): GrammarSymbol[] {
    return body.map(symbol => ({ ...symbol }));
}

export function createRule(name: string, bodies: readonly Body[] = []): Rule {
    return { name, bodies: bodies.map(copyBody) };
}

/**
 * Return a new rule with `body` appended as one more alternative.
 */
export function withBody(rule: Rule, body: Body): Rule {
    return { name: rule.name, bodies: [...rule.bodies, copyBody(body)] };
}

const FRESH_NAME = /^t(\d+)$/;

/**
 * Mint `t<k>`, with k one past the largest numeric suffix among the given
 * `t<digits>` names, so the result never collides with any of them.
 */
export function freshNonterminal(names: Iterable<string>): string {
    let max = -1;
    for (const name of names) {
        const match = FRESH_NAME.exec(name);
        if (match) {
            max = Math.max(max, Number(match[1]));
        }
    }
    return `t${max + 1}`;
}
