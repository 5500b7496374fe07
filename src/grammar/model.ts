/**
 * Grammar Model
 *
 * An ordered collection of named rules plus the synthetic `start` rule whose
 * single body is `[entry]`. Mutation operators never edit a grammar they are
 * given; they build a fresh one, so a grammar seen outside an operator is
 * always complete.
 *
 * Renderings are memoized against a version counter that every
 * `addOrReplaceRule` bumps, so a stale rendering is never returned.
 */

import { START_RULE } from '../types/grammar.js';
import type { Body, GrammarSymbol, Rule, TerminalSymbol } from '../types/grammar.js';
import { createUndefinedNonterminalError } from '../types/errors.js';
import { renderRules } from './printer.js';
import { readGrammar } from './reader.js';
import { createRule, nonterminal, symbolKey } from './symbols.js';

export class Grammar {
    private rules: Map<string, Rule> = new Map();
    private version: number = 0;
    private rendered: { version: number; text: string } | null = null;

    constructor(entry: string) {
        this.rules.set(START_RULE, createRule(START_RULE, [[nonterminal(entry)]]));
    }

    /**
     * Build a grammar from a rule list that includes the `start` rule.
     */
    static fromRules(rules: Iterable<Rule>): Grammar {
        const list = [...rules];
        const start = list.find(rule => rule.name === START_RULE);
        const head = start?.bodies[0]?.[0];
        if (!start || head === undefined || head.kind !== 'nonterminal') {
            throw createUndefinedNonterminalError(START_RULE);
        }
        const grammar = new Grammar(head.name);
        for (const rule of list) {
            grammar.addOrReplaceRule(rule);
        }
        return grammar;
    }

    /**
     * Load a grammar from its rendered text form.
     */
    static parse(text: string): Grammar {
        return Grammar.fromRules(readGrammar(text));
    }

    /**
     * The semantic entry nonterminal: the first symbol of the start rule's body.
     */
    get entry(): string {
        const head = this.rules.get(START_RULE)?.bodies[0]?.[0];
        if (head === undefined || head.kind !== 'nonterminal') {
            throw createUndefinedNonterminalError(START_RULE);
        }
        return head.name;
    }

    get size(): number {
        return this.rules.size;
    }

    getVersion(): number {
        return this.version;
    }

    getRule(name: string): Rule | undefined {
        return this.rules.get(name);
    }

    hasRule(name: string): boolean {
        return this.rules.has(name);
    }

    /** Rules in insertion order, `start` first. */
    getRules(): Rule[] {
        return [...this.rules.values()];
    }

    ruleNames(): string[] {
        return [...this.rules.keys()];
    }

    /** Every rule name except the synthetic `start` rule. */
    nonterminals(): string[] {
        return this.ruleNames().filter(name => name !== START_RULE);
    }

    /**
     * Distinct terminals occurring in any body, in first-occurrence order.
     */
    terminals(): TerminalSymbol[] {
        const seen = new Map<string, TerminalSymbol>();
        for (const rule of this.rules.values()) {
            for (const body of rule.bodies) {
                for (const symbol of body) {
                    if (symbol.kind === 'terminal' && !seen.has(symbol.value)) {
                        seen.set(symbol.value, symbol);
                    }
                }
            }
        }
        return [...seen.values()];
    }

    /**
     * Every symbol a site-based mutation may write: distinct terminals plus
     * all nonterminals except `start`.
     */
    alphabet(): GrammarSymbol[] {
        return [
            ...this.terminals(),
            ...this.nonterminals().map(name => nonterminal(name)),
        ];
    }

    bodyCount(): number {
        let count = 0;
        for (const rule of this.rules.values()) count += rule.bodies.length;
        return count;
    }

    /**
     * Referenced nonterminals with no rule, as `[referencedBy, name]` pairs.
     */
    undefinedReferences(): Array<[string, string]> {
        const missing: Array<[string, string]> = [];
        for (const rule of this.rules.values()) {
            for (const body of rule.bodies) {
                for (const symbol of body) {
                    if (symbol.kind === 'nonterminal' && !this.rules.has(symbol.name)) {
                        missing.push([rule.name, symbol.name]);
                    }
                }
            }
        }
        return missing;
    }

    addOrReplaceRule(rule: Rule): this {
        this.rules.set(rule.name, createRule(rule.name, rule.bodies));
        this.version++;
        return this;
    }

    clone(): Grammar {
        const copy = new Grammar(this.entry);
        for (const rule of this.rules.values()) {
            copy.addOrReplaceRule(rule);
        }
        return copy;
    }

    render(): string {
        if (this.rendered === null || this.rendered.version !== this.version) {
            this.rendered = { version: this.version, text: renderRules(this.rules.values()) };
        }
        return this.rendered.text;
    }

    toString(): string {
        return this.render();
    }
}

/**
 * Symbols of a body in their text form, for logging and test assertions.
 */
export function describeBody(body: Body): string[] {
    return body.map(symbolKey);
}
