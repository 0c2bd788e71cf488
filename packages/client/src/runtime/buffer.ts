import type { ChannelOutput } from '../engine/channel';
import { byteLength, type Charset } from '../codec/packer';
import { ConcurrencyError } from '../errors';

/**
 * Append-only text buffer with a fixed byte capacity. A write that would
 * pass the capacity throws and leaves the buffer unchanged.
 */
export class FixedBuffer implements ChannelOutput {
  private content = '';
  private used = 0;

  constructor(
    readonly label: string,
    readonly capacity: number,
    private readonly charset: Charset = 'utf-8'
  ) {}

  get byteLength(): number {
    return this.used;
  }

  write(text: string): void {
    const size = byteLength(text, this.charset);
    if (this.used + size > this.capacity) {
      throw ConcurrencyError.bufferOverflow(this.label, this.used + size, this.capacity);
    }
    this.content += text;
    this.used += size;
  }

  clear(): void {
    this.content = '';
    this.used = 0;
  }

  toString(): string {
    return this.content;
  }
}
