import { AudioCaptureError, RecognitionTimeoutError } from "../errors";
import { rms } from "./pcm";
import type { AudioFormat, AudioStream } from "./types";

export type RecognizerSettings = {
  energyThreshold: number;
  dynamicEnergyThreshold: boolean;
  dynamicEnergyAdjustmentDamping: number;
  dynamicEnergyRatio: number;
  /** Seconds of silence that end a phrase. */
  pauseThreshold: number;
  /** Minimum seconds of speech for a phrase to count. */
  phraseThreshold: number;
  /** Seconds of silence kept on both sides of a phrase. */
  nonSpeakingDuration: number;
};

export type ListenOptions = {
  timeoutSeconds?: number;
  phraseTimeLimitSeconds?: number;
};

export const DEFAULT_RECOGNIZER_SETTINGS: RecognizerSettings = {
  energyThreshold: 3000,
  dynamicEnergyThreshold: true,
  dynamicEnergyAdjustmentDamping: 0.15,
  dynamicEnergyRatio: 1.5,
  pauseThreshold: 0.8,
  phraseThreshold: 0.3,
  nonSpeakingDuration: 0.5,
};

/**
 * Energy-based voice activity detection over a chunked PCM stream.
 *
 * Time is counted in frames read from the stream, not on the wall clock, so
 * a timeout of 10 seconds means 10 seconds of audio.
 */
export class Recognizer {
  energyThreshold: number;
  private readonly settings: RecognizerSettings;

  constructor(
    private readonly format: AudioFormat,
    settings: Partial<RecognizerSettings> = {}
  ) {
    this.settings = { ...DEFAULT_RECOGNIZER_SETTINGS, ...settings };
    this.energyThreshold = this.settings.energyThreshold;
  }

  async adjustForAmbientNoise(stream: AudioStream, seconds = 1): Promise<void> {
    const limit = seconds * this.format.sampleRate;
    let elapsed = 0;
    for (;;) {
      elapsed += this.format.chunkFrames;
      if (elapsed > limit) break;
      const chunk = await this.readChunk(stream);
      this.adapt(rms(chunk));
    }
  }

  async listen(stream: AudioStream, options: ListenOptions = {}): Promise<Buffer> {
    const { chunkFrames, sampleRate } = this.format;
    const buffersFor = (seconds: number) =>
      Math.ceil((seconds * sampleRate) / chunkFrames);
    const pauseBuffers = buffersFor(this.settings.pauseThreshold);
    const phraseBuffers = buffersFor(this.settings.phraseThreshold);
    const nonSpeakingBuffers = buffersFor(this.settings.nonSpeakingDuration);
    const timeout =
      options.timeoutSeconds === undefined
        ? undefined
        : options.timeoutSeconds * sampleRate;
    const phraseLimit =
      options.phraseTimeLimitSeconds === undefined
        ? undefined
        : options.phraseTimeLimitSeconds * sampleRate;

    let elapsed = 0;
    let frames: Buffer[] = [];
    let pauseCount = 0;

    for (;;) {
      frames = [];

      // Wait for the energy to cross the threshold.
      for (;;) {
        elapsed += chunkFrames;
        if (timeout !== undefined && elapsed > timeout) {
          throw new RecognitionTimeoutError();
        }
        const chunk = await this.readChunk(stream);
        frames.push(chunk);
        if (frames.length > nonSpeakingBuffers) frames.shift();
        const energy = rms(chunk);
        if (energy > this.energyThreshold) break;
        if (this.settings.dynamicEnergyThreshold) this.adapt(energy);
      }

      pauseCount = 0;
      let phraseCount = 0;
      let ended = false;
      const phraseStart = elapsed;
      for (;;) {
        elapsed += chunkFrames;
        if (phraseLimit !== undefined && elapsed - phraseStart > phraseLimit) {
          break;
        }
        const chunk = await stream.read();
        if (!chunk) {
          ended = true;
          break;
        }
        frames.push(chunk);
        phraseCount += 1;
        if (rms(chunk) > this.energyThreshold) pauseCount = 0;
        else pauseCount += 1;
        if (pauseCount > pauseBuffers) break;
      }

      phraseCount -= pauseCount;
      if (phraseCount >= phraseBuffers || ended) break;
    }

    const trailing = pauseCount - nonSpeakingBuffers;
    if (trailing > 0) frames.splice(frames.length - trailing, trailing);
    return Buffer.concat(frames);
  }

  private adapt(energy: number): void {
    const secondsPerBuffer = this.format.chunkFrames / this.format.sampleRate;
    const damping =
      this.settings.dynamicEnergyAdjustmentDamping ** secondsPerBuffer;
    const target = energy * this.settings.dynamicEnergyRatio;
    this.energyThreshold =
      this.energyThreshold * damping + target * (1 - damping);
  }

  private async readChunk(stream: AudioStream): Promise<Buffer> {
    const chunk = await stream.read();
    if (!chunk) throw new AudioCaptureError("Microphone stream ended");
    return chunk;
  }
}
