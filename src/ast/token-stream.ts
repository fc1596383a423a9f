// src/ast/token-stream.ts

import {Lexer} from './lexer';
import {isEndToken, type Token} from './tokens';

/** Cursor position captured by {@link TokenStream.checkpoint}. */
export type StreamCheckpoint = number;

/**
 * Lazy token sequence over a text buffer.
 *
 * Tokens are scanned on demand and remembered, so a captured checkpoint can be
 * reverted. Once `eof` or `error` is reached the stream keeps returning that
 * token.
 */
export class TokenStream {
    private readonly lexer: Lexer;
    private readonly seen: Token[] = [];
    private cursor = 0;

    constructor(readonly text: string) {
        this.lexer = new Lexer(text);
    }

    next(): Token {
        if (this.cursor < this.seen.length) {
            return this.seen[this.cursor++];
        }

        const last = this.seen[this.seen.length - 1];
        if (last && isEndToken(last)) {
            return last;
        }

        const token = this.lexer.next();
        this.seen.push(token);
        this.cursor = this.seen.length;
        return token;
    }

    checkpoint(): StreamCheckpoint {
        return this.cursor;
    }

    revert(checkpoint: StreamCheckpoint): void {
        this.cursor = checkpoint;
    }
}
