import type { Token, TokenType } from '../types/parser.js';
import { createGrammarSyntaxError } from '../types/errors.js';

/**
 * Tokenizer for grammar text
 */
export class GrammarTokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipBlanks();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            if (this.input.startsWith('//', this.pos)) {
                this.skipComment();
                continue;
            }

            switch (char) {
                case '\n': this.addToken('NEWLINE', '\n'); this.pos++; continue;
                case ':': this.addToken('COLON', ':'); this.pos++; continue;
                case '|': this.addToken('PIPE', '|'); this.pos++; continue;
                case '"': this.readTerminal(); continue;
            }

            if (/[A-Za-z_]/.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && /[A-Za-z0-9_]/.test(this.input[this.pos])) {
                    this.pos++;
                }
                this.tokens.push({ type: 'IDENTIFIER', value: this.input.slice(start, this.pos), position: start });
                continue;
            }

            throw createGrammarSyntaxError(`Unexpected character '${char}'`, this.input, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    /** Whitespace other than newlines, which end a body. */
    private skipBlanks(): void {
        while (this.pos < this.input.length && /[^\S\n]/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private skipComment(): void {
        while (this.pos < this.input.length && this.input[this.pos] !== '\n') {
            this.pos++;
        }
    }

    /**
     * Terminals are JSON string literals; the token value is the decoded text.
     */
    private readTerminal(): void {
        const start = this.pos;
        this.pos++;
        while (this.pos < this.input.length && this.input[this.pos] !== '"') {
            if (this.input[this.pos] === '\n') break;
            this.pos += this.input[this.pos] === '\\' ? 2 : 1;
        }
        if (this.pos >= this.input.length || this.input[this.pos] !== '"') {
            throw createGrammarSyntaxError('Unterminated terminal', this.input, start);
        }
        this.pos++;

        const literal = this.input.slice(start, this.pos);
        let value: unknown;
        try {
            value = JSON.parse(literal);
        } catch {
            throw createGrammarSyntaxError(`Invalid escape in terminal ${literal}`, this.input, start);
        }
        if (typeof value !== 'string' || value.length === 0) {
            throw createGrammarSyntaxError('Terminals must match at least one character', this.input, start);
        }
        this.tokens.push({ type: 'TERMINAL', value, position: start });
    }

    private addToken(type: TokenType, value: string): void {
        this.tokens.push({ type, value, position: this.pos });
    }
}
