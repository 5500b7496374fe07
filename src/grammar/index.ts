export { Grammar, describeBody } from './model.js';
export { buildSeedGrammar } from './seed.js';
export { renderRules } from './printer.js';
export { GrammarTokenizer } from './tokenizer.js';
export { GrammarReader, readGrammar } from './reader.js';
export {
    terminal,
    nonterminal,
    symbolKey,
    symbolsEqual,
    bodyKey,
    copyBody,
    createRule,
    withBody,
    freshNonterminal,
} from './symbols.js';
