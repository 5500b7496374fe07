import { Grammar, describeBody } from '../src/grammar/model.js';
import { buildSeedGrammar } from '../src/grammar/seed.js';
import {
    createRule,
    freshNonterminal,
    nonterminal,
    symbolKey,
    symbolsEqual,
    terminal,
    withBody,
} from '../src/grammar/symbols.js';
import { GrammarException } from '../src/types/errors.js';
import { accepts } from './fixtures.js';

const SEED_AB_AC = [
    'start: t0',
    't1: "a"',
    't2: "b"',
    't3: "c"',
    't0: t1 t2',
    '   | t1 t3',
    '',
].join('\n');

describe('Symbols', () => {
    test('symbolKey quotes terminals and leaves nonterminals bare', () => {
        expect(symbolKey(terminal('a'))).toBe('"a"');
        expect(symbolKey(terminal('"'))).toBe('"\\""');
        expect(symbolKey(nonterminal('t1'))).toBe('t1');
    });

    test('a terminal never equals a nonterminal with the same text', () => {
        expect(symbolsEqual(terminal('t1'), nonterminal('t1'))).toBe(false);
        expect(symbolsEqual(terminal('a'), terminal('a'))).toBe(true);
        expect(symbolsEqual(nonterminal('t1'), nonterminal('t2'))).toBe(false);
    });

    test('freshNonterminal is one past the largest numeric suffix', () => {
        expect(freshNonterminal(['start', 't0', 't1', 't7'])).toBe('t8');
        expect(freshNonterminal(['start'])).toBe('t0');
        expect(freshNonterminal(['start', 'digit', 't2x', 't3'])).toBe('t4');
    });

    test('withBody appends without touching the original rule', () => {
        const rule = createRule('t0', [[terminal('a')]]);
        const extended = withBody(rule, [terminal('b')]);
        expect(rule.bodies).toHaveLength(1);
        expect(extended.bodies.map(describeBody)).toEqual([['"a"'], ['"b"']]);
    });
});

describe('Grammar', () => {
    test('constructor creates the start rule pointing at the entry', () => {
        const grammar = new Grammar('t0');
        expect(grammar.entry).toBe('t0');
        expect(grammar.getRule('start')?.bodies.map(describeBody)).toEqual([['t0']]);
        expect(grammar.nonterminals()).toEqual([]);
    });

    test('addOrReplaceRule keeps the original position of a replaced rule', () => {
        const grammar = new Grammar('t0')
            .addOrReplaceRule(createRule('t1', [[terminal('a')]]))
            .addOrReplaceRule(createRule('t0', [[nonterminal('t1')]]))
            .addOrReplaceRule(createRule('t1', [[terminal('b')]]));

        expect(grammar.ruleNames()).toEqual(['start', 't1', 't0']);
        expect(grammar.getRule('t1')?.bodies.map(describeBody)).toEqual([['"b"']]);
    });

    test('clone is independent of the original', () => {
        const original = buildSeedGrammar(['ab']);
        const before = original.render();
        const copy = original.clone();

        copy.addOrReplaceRule(createRule('t1', [[terminal('z')]]));
        copy.addOrReplaceRule(createRule('t9', [[terminal('q')]]));

        expect(original.render()).toBe(before);
        expect(original.hasRule('t9')).toBe(false);
        expect(copy.render()).not.toBe(before);
    });

    test('render is memoized until a rule changes', () => {
        const grammar = buildSeedGrammar(['ab']);
        const first = grammar.render();
        expect(grammar.render()).toBe(first);

        const version = grammar.getVersion();
        grammar.addOrReplaceRule(createRule('t2', [[terminal('c')]]));
        expect(grammar.getVersion()).toBe(version + 1);
        expect(grammar.render()).toBe('start: t0\nt1: "a"\nt2: "c"\nt0: t1 t2\n');
    });

    test('alphabet lists distinct terminals then non-start nonterminals', () => {
        const grammar = buildSeedGrammar(['aba']);
        expect(grammar.alphabet().map(symbolKey)).toEqual(['"a"', '"b"', 't1', 't2', 't0']);
    });

    test('undefinedReferences reports dangling nonterminals', () => {
        const grammar = new Grammar('t0').addOrReplaceRule(createRule('t0', [[nonterminal('t5')]]));
        expect(grammar.undefinedReferences()).toEqual([['t0', 't5']]);
    });

    test('parse reads a rendering back', () => {
        const grammar = buildSeedGrammar(['ab', 'ac']);
        const reread = Grammar.parse(grammar.render());
        expect(reread.render()).toBe(grammar.render());
        expect(reread.entry).toBe('t0');
    });

    test('fromRules requires a start rule', () => {
        expect(() => Grammar.fromRules([createRule('t0', [[terminal('a')]])])).toThrow(GrammarException);
    });

    test('entry follows a replaced start rule', () => {
        const grammar = new Grammar('t0').addOrReplaceRule(createRule('start', [[nonterminal('t4')]]));
        expect(grammar.entry).toBe('t4');
    });
});

describe('buildSeedGrammar', () => {
    test('one leaf per distinct character, one entry body per guide', () => {
        expect(buildSeedGrammar(['ab', 'ac']).render()).toBe(SEED_AB_AC);
    });

    test('accepts exactly the guides', () => {
        const grammar = buildSeedGrammar(['ab', 'ac']);

        expect(accepts(grammar, 'ab')).toBe(true);
        expect(accepts(grammar, 'ac')).toBe(true);
        expect(accepts(grammar, 'ba')).toBe(false);
        expect(accepts(grammar, 'abc')).toBe(false);
        expect(accepts(grammar, 'a')).toBe(false);
        expect(accepts(grammar, 'ad')).toBe(false);
        expect(accepts(grammar, '')).toBe(false);
    });

    test('escapes quote characters in terminals', () => {
        const grammar = buildSeedGrammar(['"\\']);
        expect(grammar.getRule('t1')?.bodies.map(describeBody)).toEqual([['"\\""']]);
        expect(accepts(grammar, '"\\')).toBe(true);
    });

    test('rejects an empty guide list', () => {
        expect(() => buildSeedGrammar([])).toThrow('At least one guide is required');
    });
});
