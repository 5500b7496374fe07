/**
 * Grammar text tokenizer and reader tests
 */

import { GrammarTokenizer, readGrammar } from '../src/grammar/index.js';
import { describeBody } from '../src/grammar/model.js';
import { GrammarException } from '../src/types/errors.js';

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (e) {
        if (e instanceof GrammarException) return e.code;
        throw e;
    }
    return undefined;
}

describe('GrammarTokenizer', () => {
    test('tokenizes every token type', () => {
        const tokens = new GrammarTokenizer('start: t0 | "a"\n').tokenize();
        expect(tokens.map(t => t.type)).toEqual([
            'IDENTIFIER', 'COLON', 'IDENTIFIER', 'PIPE', 'TERMINAL', 'NEWLINE', 'EOF',
        ]);
    });

    test('records token positions', () => {
        const tokens = new GrammarTokenizer('t0: "ab"').tokenize();
        expect(tokens.map(t => t.position)).toEqual([0, 2, 4, 8]);
    });

    test('decodes escaped terminals', () => {
        const tokens = new GrammarTokenizer('"\\"" "\\\\" "\\n"').tokenize();
        expect(tokens.filter(t => t.type === 'TERMINAL').map(t => t.value)).toEqual(['"', '\\', '\n']);
    });

    test('skips comments', () => {
        const tokens = new GrammarTokenizer('// header\nstart: t0 // trailing\n').tokenize();
        expect(tokens.map(t => t.type)).toEqual([
            'NEWLINE', 'IDENTIFIER', 'COLON', 'IDENTIFIER', 'NEWLINE', 'EOF',
        ]);
    });

    test('throws on invalid character', () => {
        expect(() => new GrammarTokenizer('start: t0 @').tokenize()).toThrow(/Unexpected character '@'/);
    });

    test('throws on unterminated terminal with its location', () => {
        try {
            new GrammarTokenizer('start: "a\n').tokenize();
            throw new Error('expected a syntax error');
        } catch (e) {
            expect(e).toBeInstanceOf(GrammarException);
            if (e instanceof GrammarException) {
                expect(e.message).toBe('Unterminated terminal');
                expect(e.error.span).toEqual({ start: 7, end: 8, line: 1, col: 8 });
            }
        }
    });

    test('rejects empty terminals', () => {
        expect(() => new GrammarTokenizer('t0: ""').tokenize()).toThrow('Terminals must match at least one character');
    });
});

describe('readGrammar', () => {
    test('reads rules and alternatives in order', () => {
        const rules = readGrammar('start: t0\nt0: t1 "x"\n  | t1\n\nt1: "y"\n');
        expect(rules.map(r => r.name)).toEqual(['start', 't0', 't1']);
        expect(rules[1].bodies.map(describeBody)).toEqual([['t1', '"x"'], ['t1']]);
    });

    test('distinguishes terminals from nonterminals structurally', () => {
        const [rule] = readGrammar('t0: "t1" t1\n');
        expect(rule.bodies[0]).toEqual([
            { kind: 'terminal', value: 't1' },
            { kind: 'nonterminal', name: 't1' },
        ]);
    });

    test('alternatives may share a line', () => {
        const [rule] = readGrammar('t0: "a" | "b" | t0 t0');
        expect(rule.bodies.map(describeBody)).toEqual([['"a"'], ['"b"'], ['t0', 't0']]);
    });

    test('reads empty alternatives', () => {
        const [rule] = readGrammar('t0: "a"\n  |\n');
        expect(rule.bodies.map(describeBody)).toEqual([['"a"'], []]);
    });

    test('rejects duplicate rules', () => {
        expect(codeOf(() => readGrammar('t0: "a"\nt0: "b"\n'))).toBe('DUPLICATE_RULE');
    });

    test('rejects a missing colon', () => {
        expect(() => readGrammar('start t0\n')).toThrow('Expected COLON but got IDENTIFIER');
    });

    test('rejects a colon inside a body', () => {
        expect(codeOf(() => readGrammar('t0: t1: "a"\n'))).toBe('GRAMMAR_SYNTAX');
    });

    test('empty text has no rules', () => {
        expect(readGrammar('\n// nothing\n')).toEqual([]);
    });
});
