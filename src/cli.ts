#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync, writeFileSync } from 'fs';
import chalk from 'chalk';
import boxen from 'boxen';
import { loadProblem, optionsFromEnv } from './config.js';
import { createEarleyEngine } from './engines/earley/index.js';
import { Grammar } from './grammar/model.js';
import { buildSeedGrammar } from './grammar/seed.js';
import { SearchEngine } from './search/engine.js';
import { isGoodEnough } from './search/scorer.js';
import { isGrammarException, serializeGrammarError } from './types/errors.js';
import type { SearchOptions } from './types/options.js';

const VERSION = '0.3.0';
const HELP = `
Grammar Search CLI v${VERSION}

Usage:
  grammar-search search <problem.json>        Search for a grammar for the problem
  grammar-search check <grammar.txt> <input>  Test inputs against a saved grammar

Problem file:
  { "guides": ["ab"], "positives": ["ab", "aab"], "negatives": ["ba"] }

Options:
  --generations=<n>  Generations to run (default 30)
  --population=<n>   Population capacity (default 20)
  --seed=<n>         Seed for a reproducible run
  --stop             Stop once every positive is accepted and every negative rejected
  --out=<file>       Write the best grammar to a file
  --quiet, -q        No per-generation progress
  --help, -h         Show this help
  --version, -v      Show version

Environment:
  GRAMMAR_SEARCH_POPULATION, GRAMMAR_SEARCH_GENERATIONS, GRAMMAR_SEARCH_SEED,
  GRAMMAR_SEARCH_MAX_PARSE_STEPS, GRAMMAR_SEARCH_STOP_WHEN_GOOD

Examples:
  grammar-search search --seed=7 --stop problem.json
  grammar-search check best.grammar aab abab
`;

export interface CliArgs {
    command?: string;
    positional: string[];
    options: SearchOptions;
    out?: string;
    quiet: boolean;
    help: boolean;
    version: boolean;
}

type ValueFlag = 'generations' | 'population' | 'seed' | 'out';
const VALUE_FLAGS: ReadonlySet<string> = new Set<ValueFlag>(['generations', 'population', 'seed', 'out']);

function isValueFlag(name: string): name is ValueFlag {
    return VALUE_FLAGS.has(name);
}

function toInteger(flag: string, value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n)) {
        throw new Error(`--${flag} expects an integer, got '${value}'`);
    }
    return n;
}

/**
 * Parse argv (without the node and script entries). Flags take
 * `--name=value` or `--name value`.
 */
export function parseCliArgs(args: string[]): CliArgs {
    const result: CliArgs = { positional: [], options: {}, quiet: false, help: false, version: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') { result.help = true; continue; }
        if (arg === '--version' || arg === '-v') { result.version = true; continue; }
        if (arg === '--quiet' || arg === '-q') { result.quiet = true; continue; }
        if (arg === '--stop') { result.options.stopWhenGoodEnough = true; continue; }

        if (arg.startsWith('--')) {
            const eq = arg.indexOf('=');
            const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
            if (!isValueFlag(name)) {
                throw new Error(`Unknown option '${arg}'`);
            }
            let value: string;
            if (eq >= 0) {
                value = arg.slice(eq + 1);
            } else if (i + 1 < args.length) {
                value = args[++i];
            } else {
                throw new Error(`--${name} requires a value`);
            }

            switch (name) {
                case 'generations': result.options.generations = toInteger(name, value); break;
                case 'population': result.options.populationSize = toInteger(name, value); break;
                case 'seed': result.options.seed = toInteger(name, value); break;
                case 'out': result.out = value; break;
            }
            continue;
        }

        if (result.command === undefined) {
            result.command = arg;
        } else {
            result.positional.push(arg);
        }
    }
    return result;
}

function runSearch(cli: CliArgs): number {
    const file = cli.positional[0];
    if (!file) {
        console.error(chalk.red('Error: problem file argument required'));
        return 1;
    }

    const problem = loadProblem(file);
    const options: SearchOptions = {
        ...optionsFromEnv(),
        ...cli.options,
        onProgress: cli.quiet ? undefined : (_progress, message) => {
            console.error(chalk.dim(message));
        },
    };

    console.error(chalk.bold.blue(`Searching with ${problem.guides.length} guides, ` +
        `${problem.positives.length} positives, ${problem.negatives.length} negatives`));

    const start = Date.now();
    const engine = new SearchEngine(
        buildSeedGrammar(problem.guides),
        { positives: problem.positives, negatives: problem.negatives },
        options
    );
    const result = engine.run();
    const elapsed = Date.now() - start;

    const { best } = result;
    const perfect = isGoodEnough(best.score);
    const breakdown = engine.getScorer().breakdown(best.grammar);
    const summary = [
        `Best score: ${(perfect ? chalk.green : chalk.yellow)(best.score.toFixed(4))}`,
        `Positives accepted: ${breakdown.positivesMatched}/${problem.positives.length}`,
        `Negatives accepted: ${breakdown.negativesMatched}/${problem.negatives.length}`,
        `Rules: ${best.grammar.size}, bodies: ${best.grammar.bodyCount()}`,
        `From generation: ${best.id}`,
        `Generations run: ${result.generationsRun}${result.stoppedEarly ? ' (stopped early)' : ''}`,
        `Population: ${result.population.length}`,
        `Time: ${elapsed}ms`,
    ].join('\n');
    console.error(boxen(summary, { padding: 1, borderColor: perfect ? 'green' : 'yellow' }));

    const text = best.grammar.render();
    if (cli.out) {
        writeFileSync(cli.out, text, 'utf-8');
        console.error(chalk.gray(`Grammar written to ${cli.out}`));
    }
    process.stdout.write(text);
    return 0;
}

function runCheck(cli: CliArgs): number {
    const [file, ...inputs] = cli.positional;
    if (!file) {
        console.error(chalk.red('Error: grammar file argument required'));
        return 1;
    }

    const grammar = Grammar.parse(readFileSync(file, 'utf-8'));
    const { maxParseSteps } = optionsFromEnv();
    const compiled = createEarleyEngine({ maxSteps: maxParseSteps }).compile(grammar.render());

    let rejected = 0;
    for (const input of inputs) {
        const accepted = compiled.parse(input);
        if (!accepted) rejected++;
        console.log(`${accepted ? chalk.green('accept') : chalk.red('reject')}  ${JSON.stringify(input)}`);
    }
    return rejected === 0 ? 0 : 2;
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
    let cli: CliArgs;
    try {
        cli = parseCliArgs(args);
    } catch (e) {
        console.error(chalk.red(`Error: ${e instanceof Error ? e.message : String(e)}`));
        return 1;
    }

    if (cli.version) {
        console.log(VERSION);
        return 0;
    }
    if (cli.help || !cli.command) {
        console.log(HELP);
        return 0;
    }

    try {
        switch (cli.command) {
            case 'search': return runSearch(cli);
            case 'check': return runCheck(cli);
            default:
                console.error(chalk.red(`Error: unknown command '${cli.command}'`));
                console.log(HELP);
                return 1;
        }
    } catch (e) {
        if (isGrammarException(e)) {
            console.error(chalk.red(`Error [${e.code}]: ${e.message}`));
            console.error(JSON.stringify(serializeGrammarError(e.error), null, 2));
        } else {
            console.error(chalk.red('Error:'), e);
        }
        return 1;
    }
}

if (require.main === module) {
    main().then(code => {
        process.exitCode = code;
    }).catch((error: unknown) => {
        console.error('Failed to run grammar search:', error);
        process.exit(1);
    });
}
