// src/reconcile/classifier.ts

import type {Token} from '../ast/tokens';

/**
 * Line table of a source text. Lines are 1-based; a final line break does not
 * start another (empty) line.
 */
export class SourceLines {
   private readonly lines: string[];

   constructor(text: string) {
      const lines = text.split(/\r?\n/);
      if (lines.length > 1 && lines[lines.length - 1] === '') {
         lines.pop();
      }
      this.lines = lines;
   }

   get count(): number {
      return this.lines.length;
   }

   line(n: number): string | undefined {
      return this.lines[n - 1];
   }

   /** Lines outside the text are not blank. */
   isBlank(n: number): boolean {
      const text = this.line(n);
      return text !== undefined && text.trim() === '';
   }
}

export interface CommentRecord {
   text: string;
   /** Code precedes the comment on its line. */
   trailing: boolean;
   blankLineBefore: boolean;
   blankLineAfter: boolean;
   /** Block comment spanning more than one line. */
   multiline: boolean;
   /** Code follows the comment on its line. */
   inline: boolean;
}

/**
 * Where classified comment text goes: straight after the code already
 * written (`trailing`), or into the pending buffer in front of the next
 * token (`queued`).
 */
export type CommentPlacement =
   | { kind: 'trailing'; text: string; breakAfter: boolean }
   | { kind: 'queued'; text: string };

const CODE = /[^ \t]/;

export function describeComment(token: Token, lines: SourceLines): CommentRecord {
   const { line, column } = token.start;
   const source = lines.line(line) ?? '';
   const multiline = token.end.line !== line;

   return {
      text: token.text,
      trailing: CODE.test(source.slice(0, column)),
      blankLineBefore: line > 1 && lines.isBlank(line - 1),
      blankLineAfter: lines.isBlank(token.end.line + 1),
      multiline,
      inline: !multiline && token.kind === 'block-comment' && CODE.test(source.slice(token.end.column)),
   };
}

/**
 * Classify one comment from the original source.
 *
 * `spaces` is the rendered whitespace collected since the last emitted token;
 * when it already holds a blank line, none is added in front of a leading
 * comment.
 */
export function classifyComment(token: Token, lines: SourceLines, spaces: string): CommentPlacement {
   const record = describeComment(token, lines);

   if (record.multiline) {
      return { kind: 'queued', text: `${dedentContinuation(record.text, token.start.column)}\n\n` };
   }

   if (record.trailing && !record.inline) {
      return { kind: 'trailing', text: record.text, breakAfter: token.kind === 'line-comment' };
   }

   if (record.inline) {
      return { kind: 'queued', text: `${record.text} ` };
   }

   const before = record.blankLineBefore && !endsWithBlankLine(spaces) ? '\n' : '';
   const after = record.blankLineAfter ? '\n' : '';
   return { kind: 'queued', text: `${before}${record.text}${after}\n` };
}

function endsWithBlankLine(spaces: string): boolean {
   return spaces.replace(/[ \t\r]/g, '').endsWith('\n\n');
}

/**
 * Strip up to `column` characters of indentation from every line after the
 * first, so the comment can be re-indented as a unit.
 */
function dedentContinuation(text: string, column: number): string {
   const [first, ...rest] = text.split('\n');
   const pattern = new RegExp(`^[ \\t]{0,${column}}`);
   return [first, ...rest.map((l) => l.replace(pattern, ''))].join('\n');
}
