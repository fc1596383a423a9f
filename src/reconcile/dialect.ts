// src/reconcile/dialect.ts

import type {TokenKind} from '../ast/tokens';

/**
 * A layout fixup: when the rendered stream has `trigger` followed (after
 * whitespace only) by `follow`, both are replaced by `replacement`.
 */
export interface LayoutFixup {
   name: string;
   trigger: TokenKind;
   follow: TokenKind;
   replacement: string;
}

/**
 * Everything the merge loop needs to know about the language and renderer.
 */
export interface ReconcileDialect {
   /** Kinds copied from the rendered stream without matching the original. */
   bypassKinds: ReadonlySet<TokenKind>;
   /** Evaluated in order, before the bypass check. */
   fixups: readonly LayoutFixup[];
   /**
    * Kinds the renderer drops from the original (e.g. optional semicolons).
    * Skipping them while resynchronizing is not a desynchronization.
    */
   elidedKinds: ReadonlySet<TokenKind>;
   /** Added after a trailing line comment when the next token must move down. */
   indentUnit: string;
}

export const EMPTY_BLOCK_FIXUP: LayoutFixup = {
   name: 'empty-block',
   trigger: 'brace-open',
   follow: 'brace-close',
   replacement: '{}',
};

export const DEFAULT_DIALECT: ReconcileDialect = {
   bypassKinds: new Set<TokenKind>([
      'paren-open',
      'paren-close',
      'bracket-open',
      'bracket-close',
      'brace-open',
   ]),
   fixups: [EMPTY_BLOCK_FIXUP],
   elidedKinds: new Set<TokenKind>(['semicolon']),
   indentUnit: '    ',
};

export function defineDialect(overrides: Partial<ReconcileDialect> = {}): ReconcileDialect {
   return { ...DEFAULT_DIALECT, ...overrides };
}

/**
 * Kinds whose absence from the rendered stream is expected.
 */
export function isIgnorableKind(dialect: ReconcileDialect, kind: TokenKind): boolean {
   if (dialect.bypassKinds.has(kind) || dialect.elidedKinds.has(kind)) return true;
   return dialect.fixups.some((f) => f.trigger === kind || f.follow === kind);
}
