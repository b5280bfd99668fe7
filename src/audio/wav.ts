import type { AudioFormat } from "./types";

const HEADER_BYTES = 44;

/** Wraps mono PCM in a RIFF/WAVE container. */
export function encodeWav(
  pcm: Buffer,
  format: Pick<AudioFormat, "sampleRate" | "sampleWidth">
): Buffer {
  const channels = 1;
  const blockAlign = channels * format.sampleWidth;
  const header = Buffer.alloc(HEADER_BYTES);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(format.sampleWidth * 8, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}
