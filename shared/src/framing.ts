import { StringDecoder } from 'node:string_decoder';
import { MAX_LINE_BYTES } from './constants';

export interface LineDecoderOptions {
  maxLineLength?: number;
  onOverflow?: (droppedLength: number) => void;
}

/**
 * Splits a byte/text stream into newline-delimited lines.
 * Partial lines are buffered until the next chunk; blank lines are skipped.
 */
export class LineDecoder {
  private buffer = '';
  // Keeps multi-byte UTF-8 sequences intact across chunk boundaries.
  private readonly utf8 = new StringDecoder('utf8');
  private readonly maxLineLength: number;
  private readonly onOverflow?: (droppedLength: number) => void;

  constructor(opts: LineDecoderOptions = {}) {
    this.maxLineLength = opts.maxLineLength ?? MAX_LINE_BYTES;
    this.onOverflow = opts.onOverflow;
  }

  push(chunk: string | Buffer): string[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.utf8.write(chunk);

    const lines: string[] = [];
    let idx = this.buffer.indexOf('\n');
    while (idx >= 0) {
      const line = this.buffer.slice(0, idx).trim();
      this.buffer = this.buffer.slice(idx + 1);
      if (line.length > 0) lines.push(line);
      idx = this.buffer.indexOf('\n');
    }

    if (this.buffer.length > this.maxLineLength) {
      const dropped = this.buffer.length;
      this.buffer = '';
      this.onOverflow?.(dropped);
    }

    return lines;
  }

  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = '';
  }
}

export function encodeLine(json: string): string {
  return `${json}\n`;
}
