// src/ast/lexer.ts

import {PUNCTUATION, type SourcePosition, type Token, type TokenKind} from './tokens';

const isIdentStart = (ch: string | undefined): boolean => !!ch && /[A-Za-z_]/.test(ch);
const isIdentContinue = (ch: string | undefined): boolean => !!ch && /[A-Za-z0-9_]/.test(ch);
const isDigit = (ch: string | undefined): boolean => !!ch && ch >= '0' && ch <= '9';
const isSpace = (ch: string | undefined): boolean =>
    ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';

/**
 * Incremental lexer. Each call to `next()` scans exactly one token; spaces
 * (including line breaks) and comments are returned as tokens of their own.
 *
 * Input that cannot be tokenized (an unknown character, an unterminated string
 * or block comment) yields a single `error` token, after which the lexer only
 * returns `eof`.
 */
export class Lexer {
    private offset = 0;
    private line = 1;
    private column = 0;
    private done = false;

    constructor(private readonly text: string) {}

    next(): Token {
        const start = this.position();
        if (this.done || this.offset >= this.text.length) {
            this.done = true;
            return {kind: 'eof', text: '', start, end: start};
        }

        const ch = this.text[this.offset];

        if (isSpace(ch)) {
            let j = this.offset;
            while (j < this.text.length && isSpace(this.text[j])) j++;
            return this.take('space', j);
        }

        if (ch === '/' && this.text[this.offset + 1] === '/') {
            let j = this.offset + 2;
            while (j < this.text.length && this.text[j] !== '\n' && this.text[j] !== '\r') j++;
            return this.take('line-comment', j);
        }

        if (ch === '/' && this.text[this.offset + 1] === '*') {
            return this.scanBlockComment();
        }

        if (ch === '"') {
            return this.scanString();
        }

        if (isDigit(ch)) {
            return this.scanNumber();
        }

        if (isIdentStart(ch)) {
            let j = this.offset + 1;
            while (j < this.text.length && isIdentContinue(this.text[j])) j++;
            return this.take('identifier', j);
        }

        for (const [spelling, kind] of PUNCTUATION) {
            if (this.text.startsWith(spelling, this.offset)) {
                return this.take(kind, this.offset + spelling.length);
            }
        }

        return this.fail(this.offset + 1);
    }

    private scanBlockComment(): Token {
        // Block comments nest.
        let depth = 0;
        let j = this.offset;
        while (j < this.text.length) {
            if (this.text.startsWith('/*', j)) {
                depth++;
                j += 2;
                continue;
            }
            if (this.text.startsWith('*/', j)) {
                depth--;
                j += 2;
                if (depth === 0) {
                    return this.take('block-comment', j);
                }
                continue;
            }
            j++;
        }
        return this.fail(j);
    }

    private scanString(): Token {
        let j = this.offset + 1;
        while (j < this.text.length) {
            const c = this.text[j];
            if (c === '\\') {
                j += 2;
                continue;
            }
            if (c === '\n') break;
            if (c === '"') {
                return this.take('string', j + 1);
            }
            j++;
        }
        return this.fail(Math.min(j, this.text.length));
    }

    private scanNumber(): Token {
        let j = this.offset;
        const prefix = this.text.slice(j, j + 2).toLowerCase();
        if (prefix === '0x' || prefix === '0b' || prefix === '0o') {
            j += 2;
            while (j < this.text.length && /[0-9A-Fa-f_]/.test(this.text[j])) j++;
            return this.take('integer', j);
        }

        while (j < this.text.length && (isDigit(this.text[j]) || this.text[j] === '_')) j++;
        if (this.text[j] === '.' && isDigit(this.text[j + 1])) {
            j++;
            while (j < this.text.length && (isDigit(this.text[j]) || this.text[j] === '_')) j++;
            return this.take('fixed-point', j);
        }
        return this.take('integer', j);
    }

    private fail(endOffset: number): Token {
        const token = this.take('error', endOffset);
        this.done = true;
        return token;
    }

    private take(kind: TokenKind, endOffset: number): Token {
        const start = this.position();
        const text = this.text.slice(this.offset, endOffset);
        for (const c of text) {
            if (c === '\n') {
                this.line++;
                this.column = 0;
            } else {
                this.column += c.length;
            }
        }
        this.offset = endOffset;
        return {kind, text, start, end: this.position()};
    }

    private position(): SourcePosition {
        return {offset: this.offset, line: this.line, column: this.column};
    }
}

/**
 * Tokenize the whole text. The last token is always `eof` or `error`.
 */
export function tokenize(text: string): Token[] {
    const lexer = new Lexer(text);
    const out: Token[] = [];
    for (;;) {
        const token = lexer.next();
        out.push(token);
        if (token.kind === 'eof' || token.kind === 'error') break;
    }
    return out;
}
