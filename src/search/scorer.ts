import type { Grammar } from '../grammar/model.js';
import type { CompiledGrammar, EngineCompileOptions, GrammarEngine } from '../engines/interface.js';
import { createUndefinedNonterminalError, isGrammarException } from '../types/errors.js';

export interface ScoreBreakdown {
    score: number;
    positivesMatched: number;
    negativesMatched: number;
    /** Why the grammar failed to compile, if it did */
    compileError?: string;
}

/**
 * Scores a grammar against fixed positive and negative examples.
 *
 * positive = max(P / |positives|, 0.5 / |positives|)
 * negative = max(1 - N / |negatives|, 0.5 / |negatives|)
 * score    = positive * negative
 *
 * Both factors are floored so a grammar that matches no positive (or every
 * negative) still scores above zero. An empty example set contributes 1.
 * Compile or parse failures, including an exhausted step budget, count as
 * "does not match" and are never rethrown. A grammar with a dangling
 * reference is rejected before it reaches the engine.
 */
export class Scorer {
    private readonly positives: readonly string[];
    private readonly negatives: readonly string[];
    private readonly engine: GrammarEngine;
    private readonly compileOptions: EngineCompileOptions;

    constructor(
        positives: readonly string[],
        negatives: readonly string[],
        engine: GrammarEngine,
        compileOptions: EngineCompileOptions = {}
    ) {
        this.positives = [...positives];
        this.negatives = [...negatives];
        this.engine = engine;
        this.compileOptions = compileOptions;
    }

    score(grammar: Grammar): number {
        return this.breakdown(grammar).score;
    }

    breakdown(grammar: Grammar): ScoreBreakdown {
        const [dangling] = grammar.undefinedReferences();
        if (dangling !== undefined) {
            const [referencedBy, name] = dangling;
            return this.failed(createUndefinedNonterminalError(name, referencedBy));
        }

        let compiled: CompiledGrammar;
        try {
            compiled = this.engine.compile(grammar.render(), this.compileOptions);
        } catch (e) {
            return this.failed(e);
        }

        const positivesMatched = this.countMatches(compiled, this.positives);
        const negativesMatched = this.countMatches(compiled, this.negatives);
        return {
            score: this.combine(positivesMatched, negativesMatched),
            positivesMatched,
            negativesMatched,
        };
    }

    private failed(e: unknown): ScoreBreakdown {
        return {
            score: this.combine(0, 0),
            positivesMatched: 0,
            negativesMatched: 0,
            compileError: describeFailure(e),
        };
    }

    private combine(positivesMatched: number, negativesMatched: number): number {
        const p = this.positives.length;
        const n = this.negatives.length;
        const positiveScore = p === 0 ? 1 : Math.max(positivesMatched / p, 0.5 / p);
        const negativeScore = n === 0 ? 1 : Math.max(1 - negativesMatched / n, 0.5 / n);
        return positiveScore * negativeScore;
    }

    private countMatches(compiled: CompiledGrammar, examples: readonly string[]): number {
        let matched = 0;
        for (const example of examples) {
            if (parses(compiled, example)) matched++;
        }
        return matched;
    }
}

function parses(compiled: CompiledGrammar, input: string): boolean {
    try {
        return compiled.parse(input);
    } catch {
        // Budget exhaustion and engine failures mean "no match" for this example only
        return false;
    }
}

function describeFailure(e: unknown): string {
    if (isGrammarException(e)) return `${e.code}: ${e.message}`;
    return e instanceof Error ? e.message : String(e);
}

/**
 * Whether a score means every positive matched and no negative did.
 */
export function isGoodEnough(score: number): boolean {
    return score >= 1;
}
