/**
 * MAPI block framing.
 *
 * Every message travels as a sequence of blocks. A block starts with a
 * 2-byte little-endian header holding `(length << 1) | last`, followed by
 * `length` payload bytes. The block with the `last` bit set ends the message.
 */
import { MAX_BLOCK_SIZE } from "./constants";

const HEADER_LENGTH = 2;

export interface Block {
  last: boolean;
  data: Uint8Array;
}

export interface ParsedBlockResult {
  block: Block | null;
  bytesRead: number;
}

export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  if (arrays.length === 1) {
    return arrays[0];
  }

  const totalLength = arrays.reduce((acc, array) => acc + array.byteLength, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const array of arrays) {
    result.set(array, offset);
    offset += array.byteLength;
  }
  return result;
}

export function uint8ArrayToString(buffer: Uint8Array): string {
  return new TextDecoder().decode(buffer);
}

/**
 * Serializes a message into one or more blocks. An empty message is a
 * single empty block with the last bit set.
 */
export function serializeMessage(message: string): Uint8Array {
  const payload = new TextEncoder().encode(message);
  const blocks: Uint8Array[] = [];
  let offset = 0;

  do {
    const length = Math.min(MAX_BLOCK_SIZE, payload.byteLength - offset);
    const last = offset + length >= payload.byteLength;
    const block = new Uint8Array(HEADER_LENGTH + length);
    new DataView(block.buffer).setUint16(0, (length << 1) | (last ? 1 : 0), true);
    block.set(payload.subarray(offset, offset + length), HEADER_LENGTH);
    blocks.push(block);
    offset += length;
  } while (offset < payload.byteLength);

  return concatUint8Arrays(blocks);
}

/**
 * Attempts to read one block at `offset`. Returns a null block and zero
 * bytes read while the buffer does not yet hold the whole block.
 */
export function parseBlock(buffer: Uint8Array, offset: number = 0): ParsedBlockResult {
  if (buffer.byteLength < offset + HEADER_LENGTH) {
    return { block: null, bytesRead: 0 };
  }

  const header = new DataView(buffer.buffer, buffer.byteOffset + offset, HEADER_LENGTH).getUint16(0, true);
  const length = header >> 1;

  if (buffer.byteLength < offset + HEADER_LENGTH + length) {
    return { block: null, bytesRead: 0 };
  }

  return {
    block: {
      last: (header & 1) === 1,
      data: buffer.subarray(offset + HEADER_LENGTH, offset + HEADER_LENGTH + length),
    },
    bytesRead: HEADER_LENGTH + length,
  };
}

/**
 * Reassembles messages from socket chunks of any size.
 */
export class BlockDecoder {
  private pending: Uint8Array = new Uint8Array(0);
  private parts: Uint8Array[] = [];

  /**
   * Feeds a chunk and returns the messages it completed, oldest first.
   */
  push(chunk: Uint8Array): string[] {
    const buffer = concatUint8Arrays([this.pending, chunk]);
    const messages: string[] = [];
    let offset = 0;

    for (;;) {
      const { block, bytesRead } = parseBlock(buffer, offset);
      if (!block) {
        break;
      }
      offset += bytesRead;
      // copy, the block views into a buffer that is about to be dropped
      this.parts.push(block.data.slice());
      if (block.last) {
        // multi-byte characters may straddle blocks, decode the joined payload only
        messages.push(uint8ArrayToString(concatUint8Arrays(this.parts)));
        this.parts = [];
      }
    }

    this.pending = buffer.slice(offset);
    return messages;
  }
}
