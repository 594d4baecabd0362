// packages/core/src/cache/codec.ts

import { IntegrityError } from '@embedcache/shared';

export const BYTES_PER_COMPONENT = Float32Array.BYTES_PER_ELEMENT;

const HOST_IS_LITTLE_ENDIAN = new Uint8Array(new Uint32Array([1]).buffer)[0] === 1;

/** Rounds each component to float32, the width values are stored with. */
export function toFloat32(vector: Float32Array | readonly number[]): Float32Array {
  return vector instanceof Float32Array ? vector : Float32Array.from(vector);
}

/**
 * Encodes a vector as little-endian float32 bytes.
 */
export function encodeVector(vector: Float32Array | readonly number[]): Uint8Array {
  const floats = toFloat32(vector);
  if (HOST_IS_LITTLE_ENDIAN) {
    // Raw copy keeps every bit, NaN payloads included.
    return new Uint8Array(floats.buffer.slice(floats.byteOffset, floats.byteOffset + floats.byteLength));
  }
  const out = new Uint8Array(floats.length * BYTES_PER_COMPONENT);
  const view = new DataView(out.buffer);
  floats.forEach((value, i) => view.setFloat32(i * BYTES_PER_COMPONENT, value, true));
  return out;
}

/**
 * Decodes little-endian float32 bytes. When `expectedDims` is given the byte
 * length must match it exactly.
 */
export function decodeVector(bytes: Uint8Array, expectedDims?: number): Float32Array {
  if (bytes.byteLength % BYTES_PER_COMPONENT !== 0) {
    throw new IntegrityError(
      `Encoded vector length ${bytes.byteLength} is not a multiple of ${BYTES_PER_COMPONENT}`,
      { details: { byteLength: bytes.byteLength } },
    );
  }
  if (expectedDims !== undefined && bytes.byteLength !== expectedDims * BYTES_PER_COMPONENT) {
    throw new IntegrityError(
      `Encoded vector has ${bytes.byteLength / BYTES_PER_COMPONENT} components, expected ${expectedDims}`,
      { details: { byteLength: bytes.byteLength, expectedDims } },
    );
  }

  const dims = bytes.byteLength / BYTES_PER_COMPONENT;
  if (HOST_IS_LITTLE_ENDIAN) {
    return new Float32Array(bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength));
  }
  const out = new Float32Array(dims);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  for (let i = 0; i < dims; i++) {
    out[i] = view.getFloat32(i * BYTES_PER_COMPONENT, true);
  }
  return out;
}
