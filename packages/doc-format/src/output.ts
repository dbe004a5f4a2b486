/**
 * Append-only text buffer that one render call writes into.
 *
 * Format hooks receive the buffer of the call in progress; nested renders
 * (paragraphs, block code inside a content tree) use a fresh one and splice
 * its text back in.
 */
export class OutputBuffer {
  private readonly chunks: string[] = [];
  private size = 0;

  append(text: string): this {
    this.chunks.push(text);
    this.size += text.length;
    return this;
  }

  /** Append `text` followed by a newline */
  appendLine(text = ""): this {
    return this.append(`${text}\n`);
  }

  get length(): number {
    return this.size;
  }

  toString(): string {
    return this.chunks.join("");
  }
}

/**
 * Run `write` against a fresh buffer and return what it wrote.
 */
export function renderToString(write: (to: OutputBuffer) => void): string {
  const buffer = new OutputBuffer();
  write(buffer);
  return buffer.toString();
}
