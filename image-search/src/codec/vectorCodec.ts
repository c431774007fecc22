import { CorruptVectorError } from '../errors';
import type { Vector } from '../types';

/**
 * Fixed-width vector blob format.
 *
 *   offset 0  4 bytes   ASCII "EMBV"
 *   offset 4  1 byte    format version (1)
 *   offset 5  1 byte    element size in bytes (8, IEEE-754 binary64)
 *   offset 6  2 bytes   reserved (0)
 *   offset 8  4 bytes   dimension count, uint32 little-endian
 *   offset 12 8*D bytes components, float64 little-endian
 */
export const MAGIC = Buffer.from('EMBV', 'ascii');
export const FORMAT_VERSION = 1;
export const ELEMENT_SIZE = 8;
export const HEADER_SIZE = 12;

export class VectorCodec {
  readonly dimension: number;

  constructor(dimension: number) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`vector dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
  }

  /** Size in bytes of every blob this codec writes. */
  get blobSize(): number {
    return HEADER_SIZE + this.dimension * ELEMENT_SIZE;
  }

  encode(vector: Vector): Buffer {
    if (vector.length !== this.dimension) {
      throw new RangeError(`expected ${this.dimension} components, got ${vector.length}`);
    }
    const blob = Buffer.alloc(this.blobSize);
    MAGIC.copy(blob, 0);
    blob.writeUInt8(FORMAT_VERSION, 4);
    blob.writeUInt8(ELEMENT_SIZE, 5);
    blob.writeUInt16LE(0, 6);
    blob.writeUInt32LE(this.dimension, 8);
    for (let i = 0; i < vector.length; i++) {
      const value = vector[i];
      if (!Number.isFinite(value)) {
        throw new RangeError(`component ${i} is not a finite number`);
      }
      blob.writeDoubleLE(value, HEADER_SIZE + i * ELEMENT_SIZE);
    }
    return blob;
  }

  decode(blob: Uint8Array): Vector {
    const buf = Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength);
    if (buf.length < HEADER_SIZE) {
      throw new CorruptVectorError(`blob is ${buf.length} bytes, shorter than the ${HEADER_SIZE}-byte header`);
    }
    if (!buf.subarray(0, 4).equals(MAGIC)) {
      throw new CorruptVectorError('missing EMBV header');
    }
    const version = buf.readUInt8(4);
    if (version !== FORMAT_VERSION) {
      throw new CorruptVectorError(`unsupported format version ${version}`);
    }
    const elementSize = buf.readUInt8(5);
    if (elementSize !== ELEMENT_SIZE) {
      throw new CorruptVectorError(`element size ${elementSize} does not match ${ELEMENT_SIZE}`);
    }
    const recorded = buf.readUInt32LE(8);
    if (recorded !== this.dimension) {
      throw new CorruptVectorError(`recorded dimension ${recorded} does not match ${this.dimension}`);
    }
    const payload = buf.length - HEADER_SIZE;
    if (payload % ELEMENT_SIZE !== 0) {
      throw new CorruptVectorError(`payload of ${payload} bytes is not a multiple of ${ELEMENT_SIZE}`);
    }
    if (payload !== this.dimension * ELEMENT_SIZE) {
      throw new CorruptVectorError(`payload holds ${payload / ELEMENT_SIZE} components, expected ${this.dimension}`);
    }

    const vector: Vector = [];
    for (let i = 0; i < this.dimension; i++) {
      const value = buf.readDoubleLE(HEADER_SIZE + i * ELEMENT_SIZE);
      if (!Number.isFinite(value)) {
        throw new CorruptVectorError(`component ${i} is not a finite number`);
      }
      vector.push(value);
    }
    return vector;
  }
}
