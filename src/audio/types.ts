export type AudioFormat = {
  sampleRate: number;
  /** Bytes per sample; capture is always mono signed little-endian PCM. */
  sampleWidth: number;
  chunkFrames: number;
};

export interface AudioStream {
  /** Next fixed-size chunk, or null once the source has ended. */
  read(): Promise<Buffer | null>;
  close(): Promise<void>;
}

export interface AudioSource {
  readonly format: AudioFormat;
  open(signal?: AbortSignal): AudioStream;
}

export type CapturedAudio = {
  pcm: Buffer;
  format: AudioFormat;
};

export type CaptureHooks = {
  onListening?: () => void;
};

export interface SpeechCapture {
  capture(hooks?: CaptureHooks): Promise<CapturedAudio>;
}

export const DEFAULT_AUDIO_FORMAT: AudioFormat = {
  sampleRate: 16000,
  sampleWidth: 2,
  chunkFrames: 1024,
};
