/**
 * Configuration
 *
 * Problem files and search settings are validated with zod. Settings come
 * from DEFAULTS, overridden by GRAMMAR_SEARCH_* environment variables, then
 * by explicit options.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { createInvalidConfigError, createInvalidExamplesError } from './types/errors.js';
import { DEFAULTS } from './types/options.js';
import type { SearchOptions } from './types/options.js';

export const problemSchema = z.object({
    guides: z.array(z.string().min(1, 'guides must be non-empty strings')).min(1, 'at least one guide is required'),
    positives: z.array(z.string()),
    negatives: z.array(z.string()),
});

export type Problem = z.infer<typeof problemSchema>;

export const searchSettingsSchema = z.object({
    populationSize: z.number().int().min(1),
    generations: z.number().int().min(0),
    cascadeLengths: z.array(z.number().int().min(1)).min(1),
    mutations: z.array(z.enum(['bubble', 'coalesce', 'alternate', 'repeat'])).min(1),
    maxAttemptsPerGeneration: z.number().int().min(1),
    maxParseSteps: z.number().int().min(1),
    stopWhenGoodEnough: z.boolean(),
    seed: z.number().int().optional(),
});

export type SearchSettings = z.infer<typeof searchSettingsSchema>;

const flag = z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform(value => value === undefined ? undefined : value === 'true' || value === '1');

const envSchema = z.object({
    GRAMMAR_SEARCH_POPULATION: z.coerce.number().int().min(1).optional(),
    GRAMMAR_SEARCH_GENERATIONS: z.coerce.number().int().min(0).optional(),
    GRAMMAR_SEARCH_SEED: z.coerce.number().int().optional(),
    GRAMMAR_SEARCH_MAX_PARSE_STEPS: z.coerce.number().int().min(1).optional(),
    GRAMMAR_SEARCH_STOP_WHEN_GOOD: flag,
});

/**
 * Read search overrides from GRAMMAR_SEARCH_* variables.
 */
export function optionsFromEnv(env: Record<string, string | undefined> = process.env): SearchOptions {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw createInvalidConfigError('Invalid GRAMMAR_SEARCH_* environment variable', {
            issues: result.error.issues,
        });
    }
    const parsed = result.data;
    const options: SearchOptions = {};
    if (parsed.GRAMMAR_SEARCH_POPULATION !== undefined) options.populationSize = parsed.GRAMMAR_SEARCH_POPULATION;
    if (parsed.GRAMMAR_SEARCH_GENERATIONS !== undefined) options.generations = parsed.GRAMMAR_SEARCH_GENERATIONS;
    if (parsed.GRAMMAR_SEARCH_SEED !== undefined) options.seed = parsed.GRAMMAR_SEARCH_SEED;
    if (parsed.GRAMMAR_SEARCH_MAX_PARSE_STEPS !== undefined) options.maxParseSteps = parsed.GRAMMAR_SEARCH_MAX_PARSE_STEPS;
    if (parsed.GRAMMAR_SEARCH_STOP_WHEN_GOOD !== undefined) options.stopWhenGoodEnough = parsed.GRAMMAR_SEARCH_STOP_WHEN_GOOD;
    return options;
}

/**
 * Fill unset options from DEFAULTS and validate.
 */
export function resolveSearchSettings(options: SearchOptions = {}): SearchSettings {
    const result = searchSettingsSchema.safeParse({
        populationSize: options.populationSize ?? DEFAULTS.populationSize,
        generations: options.generations ?? DEFAULTS.generations,
        cascadeLengths: options.cascadeLengths ?? DEFAULTS.cascadeLengths,
        mutations: options.mutations ?? DEFAULTS.mutations,
        maxAttemptsPerGeneration: options.maxAttemptsPerGeneration ?? DEFAULTS.maxAttemptsPerGeneration,
        maxParseSteps: options.maxParseSteps ?? DEFAULTS.maxParseSteps,
        stopWhenGoodEnough: options.stopWhenGoodEnough ?? DEFAULTS.stopWhenGoodEnough,
        seed: options.seed,
    });
    if (!result.success) {
        throw createInvalidConfigError('Invalid search options', { issues: result.error.issues });
    }
    return result.data;
}

export function parseProblem(data: unknown): Problem {
    const result = problemSchema.safeParse(data);
    if (!result.success) {
        throw createInvalidExamplesError('Invalid problem definition', { issues: result.error.issues });
    }
    return result.data;
}

/**
 * Load a problem file: JSON with guides, positives and negatives.
 */
export function loadProblem(filePath: string): Problem {
    const content = fs.readFileSync(filePath, 'utf-8');
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (e) {
        throw createInvalidExamplesError(`Problem file ${filePath} is not valid JSON`, {
            cause: e instanceof Error ? e.message : String(e),
        });
    }
    return parseProblem(data);
}
