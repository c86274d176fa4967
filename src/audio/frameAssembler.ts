/**
 * Re-frames an arbitrary byte stream into fixed-size blocks.
 * Bytes short of a full block stay pending until more input arrives.
 */
export class FrameAssembler {
  readonly frameBytes: number;
  #pending: Buffer = Buffer.alloc(0);

  constructor(frameBytes: number) {
    if (!Number.isInteger(frameBytes) || frameBytes <= 0) {
      throw new Error(`frameBytes must be a positive integer, got ${frameBytes}`);
    }
    this.frameBytes = frameBytes;
  }

  get pendingBytes(): number {
    return this.#pending.length;
  }

  push(chunk: Buffer): Buffer[] {
    if (chunk.length === 0) return [];
    const data = this.#pending.length > 0 ? Buffer.concat([this.#pending, chunk]) : chunk;
    const frames: Buffer[] = [];
    let offset = 0;
    while (data.length - offset >= this.frameBytes) {
      // Copy so a frame never aliases the child process' read buffer.
      frames.push(Buffer.from(data.subarray(offset, offset + this.frameBytes)));
      offset += this.frameBytes;
    }
    this.#pending = Buffer.from(data.subarray(offset));
    return frames;
  }

  reset(): void {
    this.#pending = Buffer.alloc(0);
  }
}
