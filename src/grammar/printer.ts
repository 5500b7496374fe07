import type { Rule } from '../types/grammar.js';
import { bodyKey } from './symbols.js';

/**
 * Render rules to the grammar text format read back by `readGrammar`:
 *
 *   start: t0
 *   t0: t1 t2
 *     | t1 t3
 *   t1: "a"
 */
export function renderRules(rules: Iterable<Rule>): string {
    const lines: string[] = [];
    for (const rule of rules) {
        // The text format has no way to say "no alternatives" (a bare header is an
        // empty alternative), so such a rule is left out and references to it fail to compile.
        if (rule.bodies.length === 0) continue;
        const indent = ' '.repeat(rule.name.length);
        rule.bodies.forEach((body, i) => {
            const text = bodyKey(body);
            const head = i === 0 ? `${rule.name}:` : `${indent} |`;
            lines.push(text.length > 0 ? `${head} ${text}` : head);
        });
    }
    return lines.join('\n') + '\n';
}
