import { Recognizer } from "./recognizer";
import type { RecognizerSettings } from "./recognizer";
import type {
  AudioSource,
  CaptureHooks,
  CapturedAudio,
  SpeechCapture,
} from "./types";

export type CaptureOptions = {
  calibrationSeconds: number;
  timeoutSeconds: number;
  phraseTimeLimitSeconds: number;
  recognizer?: Partial<RecognizerSettings>;
};

export const DEFAULT_CAPTURE_OPTIONS: CaptureOptions = {
  calibrationSeconds: 1,
  timeoutSeconds: 10,
  phraseTimeLimitSeconds: 5,
};

/**
 * One utterance per call: calibrate against ambient noise, then record a
 * phrase. The recognizer (and its adapted threshold) lives for the session.
 */
export class MicrophoneCapture implements SpeechCapture {
  private readonly recognizer: Recognizer;

  constructor(
    private readonly source: AudioSource,
    private readonly options: CaptureOptions = DEFAULT_CAPTURE_OPTIONS,
    private readonly signal?: AbortSignal
  ) {
    this.recognizer = new Recognizer(source.format, options.recognizer);
  }

  async capture(hooks: CaptureHooks = {}): Promise<CapturedAudio> {
    const stream = this.source.open(this.signal);
    try {
      await this.recognizer.adjustForAmbientNoise(
        stream,
        this.options.calibrationSeconds
      );
      hooks.onListening?.();
      const pcm = await this.recognizer.listen(stream, {
        timeoutSeconds: this.options.timeoutSeconds,
        phraseTimeLimitSeconds: this.options.phraseTimeLimitSeconds,
      });
      return { pcm, format: this.source.format };
    } finally {
      await stream.close();
    }
  }
}
