// src/ast/tokens.ts

/**
 * Every token kind the lexer can produce.
 *
 * Keywords are not distinguished from identifiers; the parser checks the
 * identifier text where it needs a keyword.
 */
export type TokenKind =
    | 'eof'
    | 'error'
    | 'space'
    | 'line-comment'
    | 'block-comment'
    | 'identifier'
    | 'integer'
    | 'fixed-point'
    | 'string'
    | 'paren-open'
    | 'paren-close'
    | 'bracket-open'
    | 'bracket-close'
    | 'brace-open'
    | 'brace-close'
    | 'comma'
    | 'semicolon'
    | 'colon'
    | 'dot'
    | 'at'
    | 'question'
    | 'question-dot'
    | 'double-question'
    | 'exclamation'
    | 'not-equal'
    | 'equal'
    | 'equal-equal'
    | 'less'
    | 'less-equal'
    | 'greater'
    | 'greater-equal'
    | 'plus'
    | 'minus'
    | 'star'
    | 'slash'
    | 'percent'
    | 'ampersand'
    | 'double-ampersand'
    | 'double-pipe'
    | 'move'
    | 'force-move'
    | 'swap';

export interface SourcePosition {
    /** Offset into the source text (UTF-16 code units). */
    offset: number;
    /** 1-based line. */
    line: number;
    /** 0-based column. */
    column: number;
}

export interface Token {
    kind: TokenKind;
    text: string;
    start: SourcePosition;
    /** Exclusive end. */
    end: SourcePosition;
}

/**
 * Operator and punctuation spellings, longest first so the lexer can take the
 * first prefix that matches.
 */
export const PUNCTUATION: ReadonlyArray<readonly [string, TokenKind]> = [
    ['<->', 'swap'],
    ['<-!', 'force-move'],
    ['<-', 'move'],
    ['<=', 'less-equal'],
    ['>=', 'greater-equal'],
    ['==', 'equal-equal'],
    ['!=', 'not-equal'],
    ['&&', 'double-ampersand'],
    ['||', 'double-pipe'],
    ['??', 'double-question'],
    ['?.', 'question-dot'],
    ['(', 'paren-open'],
    [')', 'paren-close'],
    ['[', 'bracket-open'],
    [']', 'bracket-close'],
    ['{', 'brace-open'],
    ['}', 'brace-close'],
    [',', 'comma'],
    [';', 'semicolon'],
    [':', 'colon'],
    ['.', 'dot'],
    ['@', 'at'],
    ['?', 'question'],
    ['!', 'exclamation'],
    ['=', 'equal'],
    ['<', 'less'],
    ['>', 'greater'],
    ['+', 'plus'],
    ['-', 'minus'],
    ['*', 'star'],
    ['/', 'slash'],
    ['%', 'percent'],
    ['&', 'ampersand'],
];

export function isEndToken(token: Token): boolean {
    return token.kind === 'eof' || token.kind === 'error';
}

export function isCommentToken(token: Token): boolean {
    return token.kind === 'line-comment' || token.kind === 'block-comment';
}

/** Comments and whitespace: tokens the parser never sees. */
export function isTriviaToken(token: Token): boolean {
    return token.kind === 'space' || isCommentToken(token);
}
