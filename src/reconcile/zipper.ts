// src/reconcile/zipper.ts

import {TokenStream} from '../ast/token-stream';
import {isCommentToken, isEndToken, type Token, type TokenKind} from '../ast/tokens';

export interface ResyncOutcome {
   /** The original token whose kind matched, if any. */
   matched: Token | undefined;
   /** Code tokens passed over before the match (comments and spaces excluded). */
   skipped: Token[];
   /** Comments handed to the callback during this step. */
   comments: number;
   /** The original stream ran out during this step. */
   exhausted: boolean;
}

/**
 * Two cursors: the original source and its rendering.
 *
 * The rendered cursor drives. Before a rendered token is emitted the original
 * cursor is advanced to the next token of the same kind ({@link resync}); the
 * original must therefore contain the rendered tokens, apart from the kinds a
 * dialect bypasses, as an order-preserving subsequence. When it does not, a
 * step skips code tokens or runs the original stream dry, and the returned
 * outcome says so.
 */
export class StreamZipper {
   readonly original: TokenStream;
   readonly rendered: TokenStream;
   private originalDone = false;

   constructor(originalText: string, renderedText: string) {
      this.original = new TokenStream(originalText);
      this.rendered = new TokenStream(renderedText);
   }

   get originalExhausted(): boolean {
      return this.originalDone;
   }

   nextRendered(): Token {
      return this.rendered.next();
   }

   /**
    * Advance the original cursor past the next token of kind `target`, or to
    * its end. Every comment on the way is passed to `onComment` in order.
    * `eof` and `error` both count as the end, so a target of `eof` drains
    * the stream.
    */
   resync(target: TokenKind, onComment: (comment: Token) => void): ResyncOutcome {
      const skipped: Token[] = [];
      let comments = 0;
      const wasDone = this.originalDone;

      while (!this.originalDone) {
         const token = this.original.next();
         if (isEndToken(token)) {
            this.originalDone = true;
            break;
         }
         if (isCommentToken(token)) {
            comments++;
            onComment(token);
            continue;
         }
         if (token.kind === 'space') continue;
         if (token.kind === target) {
            return { matched: token, skipped, comments, exhausted: false };
         }
         skipped.push(token);
      }

      return { matched: undefined, skipped, comments, exhausted: !wasDone };
   }
}
