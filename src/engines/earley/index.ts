/**
 * Earley Engine
 *
 * Reads grammar text and compiles it into an EarleyRecognizer. Compiled
 * recognizers are cached by text, so a grammar rendered identically by
 * several candidates compiles once.
 */

import { LRUCache } from 'lru-cache';
import { readGrammar } from '../../grammar/reader.js';
import { DEFAULTS } from '../../types/options.js';
import type { CompiledGrammar, EngineCompileOptions, GrammarEngine } from '../interface.js';
import { EarleyRecognizer } from './recognizer.js';

export { EarleyRecognizer } from './recognizer.js';
export type { RecognizerOptions } from './recognizer.js';

export interface EarleyEngineOptions {
    /** Default step budget per membership test */
    maxSteps?: number;
    /** Number of compiled grammars kept */
    cacheSize?: number;
}

export class EarleyEngine implements GrammarEngine {
    readonly name = 'earley';

    private readonly maxSteps: number;
    private readonly cache: LRUCache<string, CompiledGrammar>;
    private cacheHits = 0;
    private cacheMisses = 0;

    constructor(options: EarleyEngineOptions = {}) {
        this.maxSteps = options.maxSteps ?? DEFAULTS.maxParseSteps;
        this.cache = new LRUCache({ max: options.cacheSize ?? DEFAULTS.parserCacheSize });
    }

    compile(text: string, options: EngineCompileOptions = {}): CompiledGrammar {
        const maxSteps = options.maxSteps ?? this.maxSteps;
        const key = `${maxSteps}\u0000${options.startSymbol ?? ''}\u0000${text}`;

        const cached = this.cache.get(key);
        if (cached) {
            this.cacheHits++;
            return cached;
        }
        this.cacheMisses++;

        const compiled = new EarleyRecognizer(readGrammar(text), {
            maxSteps,
            startSymbol: options.startSymbol,
        });
        this.cache.set(key, compiled);
        return compiled;
    }

    getCacheStats(): { hits: number; misses: number; size: number } {
        return { hits: this.cacheHits, misses: this.cacheMisses, size: this.cache.size };
    }

    clearCache(): void {
        this.cache.clear();
        this.cacheHits = 0;
        this.cacheMisses = 0;
    }
}

export function createEarleyEngine(options?: EarleyEngineOptions): EarleyEngine {
    return new EarleyEngine(options);
}
