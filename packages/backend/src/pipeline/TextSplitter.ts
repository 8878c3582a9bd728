export interface TextSplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

/** A chunk together with its half-open character range in the source text. */
export interface TextSpan {
  content: string;
  start: number;
  end: number;
}

export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

/**
 * Recursive character splitter that keeps every separator attached to the piece before it,
 * so consecutive chunks tile the source exactly apart from their overlap.
 */
export class RecursiveTextSplitter {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly separators: string[];

  constructor(options: TextSplitterOptions) {
    if (options.chunkSize < 1) {
      throw new Error(`chunkSize must be positive, received ${options.chunkSize}`);
    }
    if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new Error(
        `chunkOverlap must be in [0, chunkSize), received ${options.chunkOverlap} for chunkSize ${options.chunkSize}`
      );
    }

    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  split(text: string): TextSpan[] {
    if (text.length === 0) {
      return [];
    }
    return this.mergePieces(this.splitPieces(text, this.separators));
  }

  splitText(text: string): string[] {
    return this.split(text).map((span) => span.content);
  }

  private splitPieces(text: string, separators: string[]): string[] {
    if (text.length <= this.chunkSize) {
      return [text];
    }

    const index = separators.findIndex((separator) => separator === "" || text.includes(separator));
    const separator = separators[index];
    if (separator === undefined) {
      // No separator left: the text is atomic and may exceed chunkSize.
      return [text];
    }

    const remaining = separators.slice(index + 1);
    const parts = separator === "" ? Array.from(text) : splitKeepingSeparator(text, separator);
    const pieces: string[] = [];
    for (const part of parts) {
      if (part.length <= this.chunkSize) {
        pieces.push(part);
      } else {
        pieces.push(...this.splitPieces(part, remaining));
      }
    }
    return pieces;
  }

  private mergePieces(pieces: string[]): TextSpan[] {
    const spans: TextSpan[] = [];
    const window: { text: string; start: number }[] = [];
    let windowLength = 0;
    let offset = 0;

    for (const piece of pieces) {
      const pieceStart = offset;
      offset += piece.length;

      if (window.length > 0 && windowLength + piece.length > this.chunkSize) {
        spans.push(toSpan(window));

        while (
          window.length > 0 &&
          (windowLength > this.chunkOverlap || windowLength + piece.length > this.chunkSize)
        ) {
          const removed = window.shift();
          windowLength -= removed?.text.length ?? 0;
        }
      }

      window.push({ text: piece, start: pieceStart });
      windowLength += piece.length;
    }

    if (window.length > 0) {
      spans.push(toSpan(window));
    }
    return spans;
  }
}

/** Rebuilds the source text from spans produced by `split`, skipping each overlap. */
export function reconstructText(spans: TextSpan[]): string {
  let text = "";
  let end = 0;
  for (const span of spans) {
    text += span.content.slice(Math.max(0, end - span.start));
    end = span.end;
  }
  return text;
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  const parts: string[] = [];
  let start = 0;
  let index = text.indexOf(separator, start);

  while (index !== -1) {
    parts.push(text.slice(start, index + separator.length));
    start = index + separator.length;
    index = text.indexOf(separator, start);
  }
  if (start < text.length) {
    parts.push(text.slice(start));
  }
  return parts;
}

function toSpan(window: { text: string; start: number }[]): TextSpan {
  const start = window[0]?.start ?? 0;
  const content = window.map((piece) => piece.text).join("");
  return { content, start, end: start + content.length };
}
