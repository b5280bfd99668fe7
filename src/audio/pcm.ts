/** Root-mean-square energy of 16-bit little-endian PCM. */
export function rms(chunk: Buffer): number {
  const samples = Math.floor(chunk.length / 2);
  if (samples === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples; i++) {
    const s = chunk.readInt16LE(i * 2);
    sum += s * s;
  }
  return Math.sqrt(sum / samples);
}

/**
 * Re-slices an arbitrary byte stream into buffers of exactly `size` bytes.
 * A short tail is emitted last.
 */
export async function* rechunk(
  source: AsyncIterable<Buffer>,
  size: number
): AsyncGenerator<Buffer, void, undefined> {
  let pending = Buffer.alloc(0);
  for await (const data of source) {
    pending = Buffer.concat([pending, data]);
    while (pending.length >= size) {
      yield pending.subarray(0, size);
      pending = pending.subarray(size);
    }
  }
  if (pending.length > 0) yield pending;
}
