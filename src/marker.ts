/**
 * Marker contract shared by the reader's scanning routines.
 *
 * Each format supplies a closed enumeration of its tag values together with
 * a codec: `fromU16` is partial (unknown codes map to undefined), `toU16`
 * is total.
 */
export interface MarkerCodec<M> {
  fromU16(value: number): M | undefined;
  toU16(marker: M): number;
}

/**
 * Build a codec for a numeric enum whose member values are the 16-bit codes
 */
export function createEnumMarkerCodec<M extends number>(markers: readonly M[]): MarkerCodec<M> {
  const byCode = new Map<number, M>();
  for (const marker of markers) {
    byCode.set(marker, marker);
  }
  return {
    fromU16: (value) => byCode.get(value),
    toU16: (marker) => marker,
  };
}
