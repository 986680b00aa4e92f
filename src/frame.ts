import { ValidationError } from './errors';

const LENGTH_PREFIX_SIZE = 2;

/**
 * @description Largest body a single frame can carry (u16 length prefix).
 * */
export const MAX_FRAME_BODY_SIZE = 0xffff;

/**
 * @description Prefix a body with its u16 big-endian length.
 * */
export function encodeFrame(body: Buffer): Buffer {
  if (body.length > MAX_FRAME_BODY_SIZE) {
    throw new ValidationError(
      `Frame body of ${body.length} bytes exceeds ${MAX_FRAME_BODY_SIZE} bytes`,
    );
  }
  const frame = Buffer.alloc(LENGTH_PREFIX_SIZE + body.length);
  frame.writeUInt16BE(body.length, 0);
  body.copy(frame, LENGTH_PREFIX_SIZE);
  return frame;
}

/**
 * Reassembles length-prefixed frames from a TCP byte stream.
 * Chunks may split or merge frames arbitrarily.
 */
export class FrameDecoder {
  private $pending: Buffer = Buffer.alloc(0);

  /**
   * @description Bytes received that do not yet form a complete frame.
   * */
  public get buffered(): number {
    return this.$pending.length;
  }

  /**
   * @description Append a chunk and return every frame body it completes, in order.
   * */
  public push(chunk: Buffer): Buffer[] {
    this.$pending = this.$pending.length
      ? Buffer.concat([this.$pending, chunk])
      : chunk;

    const bodies: Buffer[] = [];
    while (this.$pending.length >= LENGTH_PREFIX_SIZE) {
      const size = this.$pending.readUInt16BE(0);
      const end = LENGTH_PREFIX_SIZE + size;
      if (this.$pending.length < end) break;
      bodies.push(Buffer.from(this.$pending.subarray(LENGTH_PREFIX_SIZE, end)));
      this.$pending = this.$pending.subarray(end);
    }
    return bodies;
  }

  public reset(): void {
    this.$pending = Buffer.alloc(0);
  }
}
