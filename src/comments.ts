export interface SourceComment {
  text: string;
  /** True when nothing but whitespace precedes the `#` on its line */
  standalone: boolean;
}

/**
 * Comments of one source file, keyed by 1-based line. Each comment can be
 * taken once; the statement translator decides where it lands.
 */
export class CommentTable {
  private readonly comments: Map<number, SourceComment>;

  constructor(comments: Map<number, SourceComment> = new Map()) {
    this.comments = comments;
  }

  get size(): number {
    return this.comments.size;
  }

  peek(line: number): SourceComment | undefined {
    return this.comments.get(line);
  }

  /** Remove and return the trailing comment on `line`, if any */
  takeTrailing(line: number): string | undefined {
    const comment = this.comments.get(line);
    if (!comment || comment.standalone) return undefined;
    this.comments.delete(line);
    return comment.text;
  }

  /** Remove and return every standalone comment above `line`, in source order */
  takeStandaloneBefore(line: number): string[] {
    const taken: string[] = [];
    for (const lineNo of Array.from(this.comments.keys()).sort((a, b) => a - b)) {
      if (lineNo >= line) break;
      const comment = this.comments.get(lineNo);
      if (comment?.standalone) {
        taken.push(comment.text);
        this.comments.delete(lineNo);
      }
    }
    return taken;
  }
}

/**
 * Collect `#` comments from Python source, skipping `#` inside string
 * literals (including triple-quoted strings that span lines).
 */
export function scanComments(source: string): CommentTable {
  const comments = new Map<number, SourceComment>();
  let line = 1;
  let lineStart = 0;
  let quote: string | null = null;
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === '\n') {
      line++;
      lineStart = i + 1;
      // Single-quoted strings cannot span lines; recover if one was left open
      if (quote !== null && quote.length === 1) quote = null;
      i++;
      continue;
    }

    if (quote !== null) {
      if (ch === '\\' && source[i + 1] !== '\n') {
        i += 2;
        continue;
      }
      if (source.startsWith(quote, i)) {
        i += quote.length;
        quote = null;
        continue;
      }
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = source.startsWith(ch.repeat(3), i) ? ch.repeat(3) : ch;
      i += quote.length;
      continue;
    }

    if (ch === '#') {
      let end = source.indexOf('\n', i);
      if (end === -1) end = source.length;
      const body = source.slice(i + 1, end).trim();
      if (body) {
        comments.set(line, {
          text: body,
          standalone: source.slice(lineStart, i).trim() === ''
        });
      }
      i = end;
      continue;
    }

    i++;
  }

  return new CommentTable(comments);
}
