// src/reconcile/merge.ts

import {isCommentToken, isEndToken, type Token, type TokenKind} from '../ast/tokens';
import {defaultLogger, type Logger} from '../util/logger';
import {Accumulator} from './accumulator';
import {classifyComment, SourceLines} from './classifier';
import {DEFAULT_DIALECT, isIgnorableKind, type ReconcileDialect} from './dialect';
import {applyFixup} from './fixups';
import {StreamZipper, type ResyncOutcome} from './zipper';

const moduleLogger = defaultLogger.child('[reconcile]');

export interface ReconcileOptions {
   dialect?: ReconcileDialect;
   logger?: Logger;
}

/**
 * A resynchronization step that passed over code it should have matched, or
 * ran out of original tokens. Comments carried by that step may sit in front
 * of the wrong token.
 */
export interface DesyncEvent {
   /** Kind of the rendered token being matched. */
   expected: TokenKind;
   /** Position of that token in the rendered text. */
   line: number;
   column: number;
   /** Kinds of the original code tokens passed over, in order. */
   skipped: TokenKind[];
   comments: number;
   /** The original stream ended before a match. */
   exhausted: boolean;
}

export interface ReconcileReport {
   desyncs: DesyncEvent[];
   /** Comments carried by desynchronized steps. */
   displacedComments: number;
}

export interface ReconcileResult {
   text: string;
   report: ReconcileReport;
}

/**
 * Merge `original` (comments, blank lines) into `rendered` (layout).
 */
export function reconcile(original: string, rendered: string, options: ReconcileOptions = {}): string {
   return reconcileWithReport(original, rendered, options).text;
}

export function reconcileWithReport(
   original: string,
   rendered: string,
   options: ReconcileOptions = {},
): ReconcileResult {
   return new Reconciler(original, rendered, options).run();
}

type MergeState = 'scanning-new' | 'resyncing-old' | 'emitting' | 'flushing' | 'done';

class Reconciler {
   private readonly dialect: ReconcileDialect;
   private readonly logger: Logger;
   private readonly zipper: StreamZipper;
   private readonly originalLines: SourceLines;
   private readonly renderedLines: SourceLines;
   private readonly out: Accumulator;
   private readonly desyncs: DesyncEvent[] = [];

   private state: MergeState = 'scanning-new';
   /** Rendered token waiting to be matched and emitted. */
   private current: Token | undefined;

   constructor(original: string, rendered: string, options: ReconcileOptions) {
      this.dialect = options.dialect ?? DEFAULT_DIALECT;
      this.logger = options.logger ?? moduleLogger;
      this.zipper = new StreamZipper(original, rendered);
      this.originalLines = new SourceLines(original);
      this.renderedLines = new SourceLines(rendered);
      this.out = new Accumulator(this.dialect.indentUnit);
   }

   run(): ReconcileResult {
      while (this.state !== 'done') {
         this.step();
      }
      return {
         text: this.out.result,
         report: {
            desyncs: this.desyncs,
            displacedComments: this.desyncs.reduce((n, e) => n + e.comments, 0),
         },
      };
   }

   private step(): void {
      switch (this.state) {
         case 'scanning-new':
            this.scanRendered();
            return;
         case 'resyncing-old':
            this.resyncOriginal();
            return;
         case 'emitting':
            this.emitCurrent();
            return;
         case 'flushing':
            this.out.flush();
            this.state = 'done';
            return;
         case 'done':
            return;
      }
   }

   private scanRendered(): void {
      const token = this.zipper.nextRendered();

      if (isEndToken(token)) {
         this.current = token;
         this.state = 'resyncing-old';
         return;
      }
      if (token.kind === 'space') {
         this.out.addSpace(token.text);
         return;
      }
      // The rendering carries no comments of its own.
      if (isCommentToken(token)) {
         return;
      }

      const fixup = applyFixup(this.dialect.fixups, token, this.zipper.rendered);
      if (fixup) {
         this.out.emitVerbatim(fixup.replacement);
         return;
      }

      if (this.dialect.bypassKinds.has(token.kind)) {
         this.out.emitVerbatim(token.text);
         return;
      }

      this.current = token;
      this.state = 'resyncing-old';
   }

   private resyncOriginal(): void {
      const token = this.current;
      const atEnd = token === undefined || isEndToken(token);
      const target: TokenKind = token === undefined || atEnd ? 'eof' : token.kind;

      const outcome = this.zipper.resync(target, (comment) => {
         const placement = classifyComment(comment, this.originalLines, this.out.spaces);
         if (placement.kind === 'trailing') {
            this.out.writeTrailing(placement.text, placement.breakAfter);
         } else {
            this.out.queueComment(placement.text);
         }
      });

      if (token && !atEnd) {
         this.recordDesync(token, outcome);
      }
      this.state = atEnd ? 'flushing' : 'emitting';
   }

   private emitCurrent(): void {
      const token = this.current;
      if (token) {
         this.out.emitToken(token.text, token.start.column, this.renderedLines.line(token.start.line) ?? '');
      }
      this.current = undefined;
      this.state = 'scanning-new';
   }

   private recordDesync(token: Token, outcome: ResyncOutcome): void {
      const skipped = outcome.skipped
         .map((t) => t.kind)
         .filter((kind) => !isIgnorableKind(this.dialect, kind));
      if (skipped.length === 0 && !outcome.exhausted) return;

      const event: DesyncEvent = {
         expected: token.kind,
         line: token.start.line,
         column: token.start.column,
         skipped,
         comments: outcome.comments,
         exhausted: outcome.exhausted,
      };
      this.desyncs.push(event);
      this.logger.debug(
         `desync at ${event.line}:${event.column}: expected ${event.expected}` +
            (skipped.length > 0 ? `, skipped ${skipped.join(' ')}` : '') +
            (event.exhausted ? ', original exhausted' : ''),
      );
   }
}
