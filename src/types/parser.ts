/**
 * Grammar Text Types
 */

export type TokenType =
    | 'IDENTIFIER'    // t0, start, digit (rule names and references)
    | 'TERMINAL'      // "a", "\"" (JSON string literal)
    | 'COLON'         // :
    | 'PIPE'          // |
    | 'NEWLINE'       // end of a line
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
