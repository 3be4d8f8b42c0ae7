/**
 * Bounds-checked access to buffers and maps.
 *
 * Decoders route every index, range or key taken from file content through
 * these helpers so malformed input ends in an OutOfBoundsError instead of
 * reading `undefined` or slicing silently short.
 */

import { OutOfBoundsError } from './errors.js';

interface Sliceable<S> {
  readonly length: number;
  slice(start?: number, end?: number): S;
}

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

export function getSafe<T>(seq: ArrayLike<T>, index: number): T {
  if (!isIndex(index) || index >= seq.length) {
    throw new OutOfBoundsError(`Index ${index} out of bounds (len ${seq.length})`);
  }
  return seq[index];
}

/**
 * Validate `start..end` against a container length.
 */
export function checkRange(length: number, start: number, end: number): void {
  if (!isIndex(start) || !isIndex(end)) {
    throw new OutOfBoundsError(`Range ${start}..${end} out of bounds (len ${length})`);
  }
  if (start > end) {
    throw new OutOfBoundsError(`Invalid range: start (${start}) > end (${end})`);
  }
  if (end > length) {
    throw new OutOfBoundsError(`Range ${start}..${end} out of bounds (len ${length})`);
  }
}

export function getRangeSafe<S extends Sliceable<S>>(seq: S, start: number, end: number): S {
  checkRange(seq.length, start, end);
  return seq.slice(start, end);
}

/**
 * Zero-copy variant of getRangeSafe for byte buffers.
 */
export function getSubarraySafe(bytes: Uint8Array, start: number, end: number): Uint8Array {
  checkRange(bytes.length, start, end);
  return bytes.subarray(start, end);
}

export function getKeySafe<K, V>(map: ReadonlyMap<K, V>, key: K, what = 'map'): V {
  const value = map.get(key);
  if (value === undefined) {
    throw new OutOfBoundsError(`Key ${String(key)} not found in ${what}`);
  }
  return value;
}
