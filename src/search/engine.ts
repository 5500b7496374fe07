/**
 * Search Engine
 *
 * Owns the population, the generation counter and the random source. Each
 * generation draws a parent uniformly, applies a cascade of random mutations
 * to it, scores the cascade output once, and admits it if it beats the
 * population minimum.
 */

import type { Grammar } from '../grammar/model.js';
import { buildSeedGrammar } from '../grammar/seed.js';
import { createEarleyEngine } from '../engines/earley/index.js';
import type { GrammarEngine } from '../engines/interface.js';
import { resolveSearchSettings } from '../config.js';
import type { SearchSettings } from '../config.js';
import { isSkippableMutationError } from '../types/errors.js';
import type { SearchOptions } from '../types/options.js';
import type { GenerationOutcome, Mutant, PopulationEntry, SearchResult } from '../types/search.js';
import { Random } from '../utils/random.js';
import { MUTATIONS, minimize } from './mutations/index.js';
import { Population } from './population.js';
import { Scorer, isGoodEnough } from './scorer.js';

export class SearchEngine {
    private readonly settings: SearchSettings;
    private readonly scorer: Scorer;
    private readonly rng: Random;
    private readonly population: Population;
    private readonly onProgress?: SearchOptions['onProgress'];
    private generation: number = 0;

    constructor(
        seed: Grammar,
        examples: { positives: readonly string[]; negatives: readonly string[] },
        options: SearchOptions = {},
        engine: GrammarEngine = createEarleyEngine()
    ) {
        this.settings = resolveSearchSettings(options);
        const scorer = new Scorer(examples.positives, examples.negatives, engine, {
            maxSteps: this.settings.maxParseSteps,
        });
        this.scorer = scorer;
        this.rng = new Random(this.settings.seed);
        this.onProgress = options.onProgress;
        this.population = new Population(this.settings.populationSize, {
            grammar: seed,
            id: 0,
            score: scorer.score(seed),
        });
    }

    getScorer(): Scorer {
        return this.scorer;
    }

    getGeneration(): number {
        return this.generation;
    }

    /** Always the score of the lowest-ranked entry. */
    get minimumScore(): number {
        return this.population.minimumScore;
    }

    best(): PopulationEntry {
        return this.population.best();
    }

    getPopulation(): readonly PopulationEntry[] {
        return this.population.snapshot();
    }

    /**
     * Uniform over the whole population, not weighted by score.
     */
    selectParent(): PopulationEntry {
        return this.population.at(this.rng.nextInt(0, this.population.size - 1));
    }

    /**
     * Apply a cascade of random mutations, each to the previous step's output.
     * @throws GrammarException when a step's precondition fails
     */
    proposeMutant(parent: Grammar): Mutant {
        const length = this.rng.pick(this.settings.cascadeLengths);
        let grammar = parent;
        const steps: Mutant['steps'] = [];
        for (let i = 0; i < length; i++) {
            const name = this.rng.pick(this.settings.mutations);
            grammar = MUTATIONS[name](grammar, this.rng);
            steps.push(name);
        }
        return { grammar: minimize(grammar), steps };
    }

    /**
     * Admit a scored candidate under the current generation id if it beats
     * the population minimum.
     */
    tryAdmit(grammar: Grammar, score: number): boolean {
        return this.population.tryInsert({ grammar, id: this.generation, score });
    }

    /**
     * Run one generation. Draws whose cascade hits an unmet precondition are
     * discarded and redrawn, up to maxAttemptsPerGeneration.
     */
    runGeneration(): GenerationOutcome {
        this.generation++;
        let skippedAttempts = 0;

        for (let attempt = 0; attempt < this.settings.maxAttemptsPerGeneration; attempt++) {
            const parent = this.selectParent();
            let mutant: Mutant;
            try {
                mutant = this.proposeMutant(parent.grammar);
            } catch (e) {
                if (!isSkippableMutationError(e)) throw e;
                skippedAttempts++;
                this.report(undefined, `Generation ${this.generation}: discarded draw (${e.code})`);
                continue;
            }

            const threshold = this.minimumScore;
            const score = this.scorer.score(mutant.grammar);
            const admitted = this.tryAdmit(mutant.grammar, score);
            return {
                generation: this.generation,
                parentId: parent.id,
                steps: mutant.steps,
                score,
                admitted,
                threshold,
                skippedAttempts,
                bestScore: this.best().score,
            };
        }

        return {
            generation: this.generation,
            parentId: null,
            steps: [],
            score: null,
            admitted: false,
            threshold: this.minimumScore,
            skippedAttempts,
            bestScore: this.best().score,
        };
    }

    /**
     * Run the configured number of generations, or fewer when
     * stopWhenGoodEnough is set and the best entry reaches a perfect score.
     */
    run(): SearchResult {
        const total = this.settings.generations;
        const history: GenerationOutcome[] = [];
        let stoppedEarly = false;

        this.report(0, `Seed score: ${formatScore(this.best().score)}`);

        for (let g = 0; g < total; g++) {
            if (this.settings.stopWhenGoodEnough && isGoodEnough(this.best().score)) {
                stoppedEarly = true;
                break;
            }
            const outcome = this.runGeneration();
            history.push(outcome);

            const candidate = outcome.score === null ? 'none' : formatScore(outcome.score);
            this.report(
                (g + 1) / total,
                `Generation ${outcome.generation}/${total}: best=${formatScore(outcome.bestScore)}, ` +
                `candidate=${candidate}${outcome.admitted ? ' (admitted)' : ''}`
            );
        }

        const best = this.best();
        this.report(1, `Search complete. Best score: ${formatScore(best.score)} (id ${best.id})`);

        return {
            best,
            population: this.getPopulation(),
            generationsRun: history.length,
            stoppedEarly,
            history,
        };
    }

    private report(progress: number | undefined, message: string): void {
        if (this.onProgress) this.onProgress(progress, message);
    }
}

function formatScore(score: number): string {
    return score.toFixed(4);
}

/**
 * Seed a grammar from the guides and search for one that accepts the
 * positives and rejects the negatives.
 */
export function search(
    guides: readonly string[],
    positives: readonly string[],
    negatives: readonly string[],
    options: SearchOptions = {},
    engine?: GrammarEngine
): SearchResult {
    return new SearchEngine(buildSeedGrammar(guides), { positives, negatives }, options, engine).run();
}
