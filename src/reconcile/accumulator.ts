// src/reconcile/accumulator.ts

/**
 * The three buffers of the merge: rendered whitespace since the last emitted
 * token, pending comment text, and the output.
 */
export class Accumulator {
   private spacesBuffer = '';
   private commentBuffer = '';
   private resultBuffer = '';
   /** A trailing line comment was written; the next token needs its own line. */
   private lineCommentOpen = false;

   constructor(private readonly indentUnit: string) {}

   get spaces(): string {
      return this.spacesBuffer;
   }

   get pendingComments(): string {
      return this.commentBuffer;
   }

   get result(): string {
      return this.resultBuffer;
   }

   addSpace(text: string): void {
      this.spacesBuffer += text;
   }

   queueComment(text: string): void {
      this.commentBuffer += text;
   }

   /**
    * Append a comment to the code already written, one space after it.
    * Anything pending goes out first.
    */
   writeTrailing(text: string, breakAfter: boolean): void {
      this.resultBuffer += ` ${this.commentBuffer}${text}`;
      this.commentBuffer = '';
      if (breakAfter) this.lineCommentOpen = true;
   }

   /**
    * Emit text that was not matched against the original: bypassed tokens
    * and fixup replacements.
    */
   emitVerbatim(text: string): void {
      this.resultBuffer += this.takeSpaces() + text;
   }

   /**
    * Emit a matched token with any pending comments in front of it.
    *
    * `renderedLine` is the rendered line holding the token; comment lines are
    * padded to the token's column with its whitespace-only equivalent.
    */
   emitToken(text: string, column: number, renderedLine: string): void {
      const spaces = this.takeSpaces();
      const comments = this.commentBuffer;
      this.commentBuffer = '';

      if (comments === '' || !comments.includes('\n')) {
         this.resultBuffer += spaces + comments + text;
         return;
      }

      this.resultBuffer += spaces.slice(0, spaces.lastIndexOf('\n') + 1);
      if (this.resultBuffer !== '' && !this.resultBuffer.endsWith('\n')) {
         this.resultBuffer += '\n';
      }

      const padding = renderedLine.slice(0, column).replace(/\S/g, ' ');
      this.resultBuffer += comments
         .split('\n')
         .map((l) => (l === '' ? l : padding + l))
         .join('\n');
      this.resultBuffer += padding + text;
   }

   /**
    * Write whatever is left once both streams are exhausted.
    */
   flush(): void {
      const spaces = this.spacesBuffer;
      this.spacesBuffer = '';

      if (this.commentBuffer === '') {
         this.resultBuffer += spaces;
         return;
      }

      this.resultBuffer += spaces.trimEnd();
      if (this.currentLine() !== '') {
         this.resultBuffer += '\n';
      }
      this.resultBuffer += this.commentBuffer;
      this.commentBuffer = '';
   }

   private takeSpaces(): string {
      let spaces = this.spacesBuffer;
      this.spacesBuffer = '';

      if (this.lineCommentOpen) {
         this.lineCommentOpen = false;
         if (!spaces.includes('\n')) {
            spaces = `\n${leadingWhitespace(this.currentLine())}${this.indentUnit}`;
         }
      }
      return spaces;
   }

   private currentLine(): string {
      return this.resultBuffer.slice(this.resultBuffer.lastIndexOf('\n') + 1);
   }
}

function leadingWhitespace(line: string): string {
   const match = /^[ \t]*/.exec(line);
   return match ? match[0] : '';
}
