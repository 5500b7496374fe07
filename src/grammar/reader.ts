import type { GrammarSymbol, Rule } from '../types/grammar.js';
import type { Token, TokenType } from '../types/parser.js';
import { createDuplicateRuleError, createGrammarSyntaxError } from '../types/errors.js';
import { GrammarTokenizer } from './tokenizer.js';
import { nonterminal, terminal } from './symbols.js';

/**
 * Reader for grammar text
 *
 * Grammar (EBNF-ish):
 *   grammar      = NEWLINE* (rule NEWLINE*)* EOF
 *   rule         = IDENTIFIER ':' body (NEWLINE* '|' body)*
 *   body         = (IDENTIFIER | TERMINAL)*
 *
 * A body runs to the end of its line; alternatives continue on lines that
 * start with '|'. References are not resolved here.
 */
export class GrammarReader {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    read(): Rule[] {
        const rules: Rule[] = [];
        const defined = new Set<string>();

        this.skipNewlines();
        while (this.current().type !== 'EOF') {
            const nameToken = this.current();
            const rule = this.readRule();
            if (defined.has(rule.name)) {
                throw createDuplicateRuleError(rule.name, this.originalInput, nameToken.position);
            }
            defined.add(rule.name);
            rules.push(rule);
            this.skipNewlines();
        }
        return rules;
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private peekPastNewlines(): Token {
        let i = this.pos;
        while (this.tokens[i] && this.tokens[i].type === 'NEWLINE') i++;
        return this.tokens[i] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        return this.tokens[this.pos++];
    }

    private expect(type: TokenType): Token {
        if (this.current().type !== type) {
            throw createGrammarSyntaxError(
                `Expected ${type} but got ${this.current().type}`,
                this.originalInput,
                this.current().position
            );
        }
        return this.advance();
    }

    private skipNewlines(): void {
        while (this.current().type === 'NEWLINE') this.pos++;
    }

    private readRule(): Rule {
        const name = this.expect('IDENTIFIER').value;
        this.expect('COLON');

        const bodies: GrammarSymbol[][] = [this.readBody()];
        while (this.peekPastNewlines().type === 'PIPE') {
            this.skipNewlines();
            this.advance();
            bodies.push(this.readBody());
        }
        return { name, bodies };
    }

    private readBody(): GrammarSymbol[] {
        const body: GrammarSymbol[] = [];
        for (;;) {
            const token = this.current();
            switch (token.type) {
                case 'IDENTIFIER':
                    body.push(nonterminal(token.value));
                    break;
                case 'TERMINAL':
                    body.push(terminal(token.value));
                    break;
                case 'NEWLINE':
                case 'PIPE':
                case 'EOF':
                    return body;
                default:
                    throw createGrammarSyntaxError(
                        `Unexpected token '${token.value}' in rule body`,
                        this.originalInput,
                        token.position
                    );
            }
            this.advance();
        }
    }
}

/**
 * Read grammar text into rules, in definition order.
 */
export function readGrammar(text: string): Rule[] {
    const tokens = new GrammarTokenizer(text).tokenize();
    return new GrammarReader(tokens, text).read();
}
