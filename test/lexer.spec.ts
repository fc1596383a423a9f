// test/lexer.spec.ts

import { describe, it, expect } from 'vitest';
import { tokenize, TokenStream } from '../src/ast';

const kinds = (text: string) => tokenize(text).map((t) => t.kind);

describe('tokenize', () => {
    it('keeps whitespace and comments as tokens', () => {
        expect(kinds('a // note\nb')).toEqual([
            'identifier',
            'space',
            'line-comment',
            'space',
            'identifier',
            'eof',
        ]);
    });

    it('takes the longest operator spelling', () => {
        expect(kinds('let x <- create R()')).toEqual([
            'identifier',
            'space',
            'identifier',
            'space',
            'move',
            'space',
            'identifier',
            'space',
            'identifier',
            'paren-open',
            'paren-close',
            'eof',
        ]);
        expect(kinds('a <-> b <-! c')).toEqual([
            'identifier',
            'space',
            'swap',
            'space',
            'identifier',
            'space',
            'force-move',
            'space',
            'identifier',
            'eof',
        ]);
    });

    it('nests block comments', () => {
        const tokens = tokenize('/* a /* b */ c */x');
        expect(tokens[0]).toMatchObject({ kind: 'block-comment', text: '/* a /* b */ c */' });
        expect(tokens[1]).toMatchObject({ kind: 'identifier', text: 'x' });
    });

    it('scans integer and fixed-point literals', () => {
        const tokens = tokenize('0x1F 1_000 3.25');
        expect(tokens.filter((t) => t.kind !== 'space').map((t) => [t.kind, t.text])).toEqual([
            ['integer', '0x1F'],
            ['integer', '1_000'],
            ['fixed-point', '3.25'],
            ['eof', ''],
        ]);
    });

    it('tracks 1-based lines and 0-based columns', () => {
        const b = tokenize('a\n  b')[2];
        expect(b.text).toBe('b');
        expect(b.start).toEqual({ offset: 4, line: 2, column: 2 });
        expect(b.end).toEqual({ offset: 5, line: 2, column: 3 });
    });

    it('ends with an error token on an unknown character', () => {
        const tokens = tokenize('a $ b');
        expect(tokens.map((t) => t.kind)).toEqual(['identifier', 'space', 'error']);
        expect(tokens[2].text).toBe('$');
    });

    it('reports an unterminated string as an error token', () => {
        const tokens = tokenize('x = "abc');
        expect(tokens[tokens.length - 1]).toMatchObject({ kind: 'error', text: '"abc' });
    });
});

describe('TokenStream', () => {
    it('reverts to a checkpoint', () => {
        const stream = new TokenStream('a b');
        expect(stream.next().text).toBe('a');

        const checkpoint = stream.checkpoint();
        expect(stream.next().kind).toBe('space');
        expect(stream.next().text).toBe('b');

        stream.revert(checkpoint);
        expect(stream.next().kind).toBe('space');
        expect(stream.next().text).toBe('b');
    });

    it('keeps returning eof once exhausted', () => {
        const stream = new TokenStream('a');
        stream.next();
        expect(stream.next().kind).toBe('eof');
        expect(stream.next().kind).toBe('eof');
    });

    it('keeps returning the error token after a lexing failure', () => {
        const stream = new TokenStream('$');
        expect(stream.next().kind).toBe('error');
        expect(stream.next().kind).toBe('error');
    });
});
