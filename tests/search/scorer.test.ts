import { createEarleyEngine } from '../../src/engines/earley/index.js';
import { Grammar } from '../../src/grammar/model.js';
import { buildSeedGrammar } from '../../src/grammar/seed.js';
import { createRule, nonterminal } from '../../src/grammar/symbols.js';
import { Scorer, isGoodEnough } from '../../src/search/scorer.js';

describe('Scorer', () => {
    test('perfect grammar scores 1', () => {
        const scorer = new Scorer(['ab'], ['ba'], createEarleyEngine());
        expect(scorer.score(buildSeedGrammar(['ab']))).toBe(1);
    });

    test('multiplies the positive and negative factors', () => {
        const scorer = new Scorer(['ab', 'ac', 'ad'], ['ba', 'ab'], createEarleyEngine());
        const breakdown = scorer.breakdown(buildSeedGrammar(['ab', 'ac']));

        expect(breakdown.positivesMatched).toBe(2);
        expect(breakdown.negativesMatched).toBe(1);
        expect(breakdown.score).toBeCloseTo(1 / 3, 10);
    });

    test('both factors are floored at half an example', () => {
        const scorer = new Scorer(['x'], ['ab'], createEarleyEngine());
        expect(scorer.score(buildSeedGrammar(['ab']))).toBe(0.25);
    });

    test('a grammar that fails to compile matches nothing', () => {
        const broken = new Grammar('t0').addOrReplaceRule(createRule('t0', [[nonterminal('t9')]]));
        const scorer = new Scorer(['a', 'b'], ['c'], createEarleyEngine());
        const breakdown = scorer.breakdown(broken);

        expect(breakdown.score).toBe(0.25);
        expect(breakdown.positivesMatched).toBe(0);
        expect(breakdown.compileError).toContain('UNDEFINED_NONTERMINAL');
    });

    test('an exhausted step budget counts as no match', () => {
        const scorer = new Scorer(['ab'], [], createEarleyEngine(), { maxSteps: 2 });
        expect(scorer.score(buildSeedGrammar(['ab']))).toBe(0.5);
    });

    test('an empty example set contributes a factor of 1', () => {
        const grammar = buildSeedGrammar(['ab']);
        expect(new Scorer(['ab'], [], createEarleyEngine()).score(grammar)).toBe(1);
        expect(new Scorer([], ['ba'], createEarleyEngine()).score(grammar)).toBe(1);
        expect(new Scorer([], [], createEarleyEngine()).score(grammar)).toBe(1);
    });

    test('an accepted negative halves the score when there are no positives', () => {
        const grammar = buildSeedGrammar(['ab']);
        expect(new Scorer([], ['ab'], createEarleyEngine()).score(grammar)).toBe(0.5);
    });

    test('dangling references fail before the engine is asked to compile', () => {
        const engine = createEarleyEngine();
        const broken = new Grammar('t0').addOrReplaceRule(createRule('t0', [[nonterminal('t9')]]));
        const breakdown = new Scorer(['a'], [], engine).breakdown(broken);

        expect(breakdown.score).toBe(0.5);
        expect(breakdown.compileError).toBe("UNDEFINED_NONTERMINAL: Rule 't0' references undefined nonterminal 't9'");
        expect(engine.getCacheStats().misses).toBe(0);
    });

    test('does not keep a reference to the caller\'s example arrays', () => {
        const positives = ['ab'];
        const scorer = new Scorer(positives, [], createEarleyEngine());
        positives.push('zz');
        expect(scorer.score(buildSeedGrammar(['ab']))).toBe(1);
    });
});

describe('isGoodEnough', () => {
    test('only a perfect score is good enough', () => {
        expect(isGoodEnough(1)).toBe(true);
        expect(isGoodEnough(0.999)).toBe(false);
    });
});
