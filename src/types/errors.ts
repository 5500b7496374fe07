/**
 * Structured Error System for grammar search
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for grammar operations
 */
export type GrammarErrorCode =
  | 'GRAMMAR_SYNTAX'            // Malformed grammar text
  | 'UNDEFINED_NONTERMINAL'     // Body references a rule that does not exist
  | 'DUPLICATE_RULE'            // Same rule name defined twice in grammar text
  | 'PARSE_LIMIT'               // Recognizer exceeded its step budget
  | 'INSUFFICIENT_NONTERMINALS' // Coalesce needs at least two nonterminals
  | 'EMPTY_BODY'                // No position available for a site-based mutation
  | 'NO_ALTERNATIVE'            // Alphabet has no symbol to substitute
  | 'INVALID_CONFIG'            // Options or environment failed validation
  | 'INVALID_EXAMPLES';         // Problem file failed validation

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface GrammarError {
  code: GrammarErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic grammar text or input
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping GrammarError for throw/catch patterns
 */
export class GrammarException extends Error {
  public readonly error: GrammarError;

  constructor(error: GrammarError) {
    super(error.message);
    this.name = 'GrammarException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GrammarException);
    }
  }

  get code(): GrammarErrorCode {
    return this.error.code;
  }

  toJSON(): GrammarError {
    return this.error;
  }
}

/**
 * Codes raised by mutation operators when their structural preconditions
 * do not hold. The search engine discards the attempt and redraws.
 */
const SKIPPABLE_MUTATION_CODES: ReadonlySet<GrammarErrorCode> = new Set<GrammarErrorCode>([
  'INSUFFICIENT_NONTERMINALS',
  'EMPTY_BODY',
  'NO_ALTERNATIVE',
]);

export function isGrammarException(e: unknown): e is GrammarException {
  return e instanceof GrammarException;
}

export function isSkippableMutationError(e: unknown): e is GrammarException {
  return isGrammarException(e) && SKIPPABLE_MUTATION_CODES.has(e.code);
}

/**
 * Common grammar text mistakes and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /^(?:[^"\n]|"(?:[^"\\\n]|\\.)*")*"(?:[^"\\\n]|\\.)*$/m,
      suggestion: 'Unterminated terminal - missing closing \'"\''
    },
    {
      pattern: /^\s*[A-Za-z_][^:\n]*$/m,
      suggestion: "Rule header is missing ':' after the rule name"
    },
    {
      pattern: /^\s*:/m,
      suggestion: "Rule definition is missing a name before ':'"
    },
    {
      pattern: /'[^']*'/,
      suggestion: 'Terminals use double quotes, e.g. "a"'
    },
  ];

/**
 * Get a suggestion for a grammar syntax error based on the text
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a grammar syntax error with optional span and suggestion
 */
export function createGrammarSyntaxError(
  message: string,
  input: string,
  position?: number
): GrammarException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new GrammarException({
    code: 'GRAMMAR_SYNTAX',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

export function createUndefinedNonterminalError(
  name: string,
  referencedBy?: string
): GrammarException {
  return new GrammarException({
    code: 'UNDEFINED_NONTERMINAL',
    message: referencedBy !== undefined
      ? `Rule '${referencedBy}' references undefined nonterminal '${name}'`
      : `Nonterminal '${name}' is not defined`,
    suggestion: `Add a rule for '${name}' or remove the reference`,
    details: { name, referencedBy },
  });
}

export function createDuplicateRuleError(name: string, input: string, position: number): GrammarException {
  return new GrammarException({
    code: 'DUPLICATE_RULE',
    message: `Rule '${name}' is defined more than once`,
    span: {
      start: position,
      end: position + name.length,
      line: getLineNumber(input, position),
      col: getColumnNumber(input, position),
    },
    suggestion: `Merge the definitions of '${name}' into one rule with '|' alternatives`,
    details: { name },
  });
}

/**
 * Create a parse limit error
 */
export function createParseLimitError(
  limit: number,
  input: string
): GrammarException {
  return new GrammarException({
    code: 'PARSE_LIMIT',
    message: `Parse step limit of ${limit} exceeded`,
    suggestion: 'Increase maxParseSteps, or the grammar may be pathologically ambiguous',
    context: input,
    details: { limit },
  });
}

export function createInsufficientNonterminalsError(
  available: number,
  required: number = 2
): GrammarException {
  return new GrammarException({
    code: 'INSUFFICIENT_NONTERMINALS',
    message: `Coalesce needs at least ${required} nonterminals but only ${available} available`,
    details: { available, required },
  });
}

export function createEmptyBodyError(rule?: string): GrammarException {
  return new GrammarException({
    code: 'EMPTY_BODY',
    message: rule !== undefined
      ? `Rule '${rule}' has no symbol position to mutate`
      : 'Grammar has no rule body to mutate',
    details: rule !== undefined ? { rule } : undefined,
  });
}

export function createNoAlternativeError(symbol: string): GrammarException {
  return new GrammarException({
    code: 'NO_ALTERNATIVE',
    message: `No alternative symbol available to replace ${symbol}`,
    details: { symbol },
  });
}

export function createInvalidConfigError(
  message: string,
  details?: Record<string, unknown>
): GrammarException {
  return new GrammarException({
    code: 'INVALID_CONFIG',
    message,
    suggestion: 'Check command-line flags and GRAMMAR_SEARCH_* environment variables',
    details,
  });
}

export function createInvalidExamplesError(
  message: string,
  details?: Record<string, unknown>
): GrammarException {
  return new GrammarException({
    code: 'INVALID_EXAMPLES',
    message,
    suggestion: 'A problem file needs at least one non-empty guide plus positives and negatives arrays',
    details,
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a GrammarError for JSON output
 */
export function serializeGrammarError(error: GrammarError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
