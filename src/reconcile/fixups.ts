// src/reconcile/fixups.ts

import type {Token} from '../ast/tokens';
import type {TokenStream} from '../ast/token-stream';
import type {LayoutFixup} from './dialect';

/**
 * Try each fixup whose trigger matches `token`. On a match the following
 * token has been consumed from `stream` and the rule is returned; otherwise
 * the stream is left where it was.
 */
export function applyFixup(
   fixups: readonly LayoutFixup[],
   token: Token,
   stream: TokenStream,
): LayoutFixup | undefined {
   for (const fixup of fixups) {
      if (fixup.trigger !== token.kind) continue;

      const checkpoint = stream.checkpoint();
      let next = stream.next();
      while (next.kind === 'space') {
         next = stream.next();
      }
      if (next.kind === fixup.follow) {
         return fixup;
      }
      stream.revert(checkpoint);
   }
   return undefined;
}
