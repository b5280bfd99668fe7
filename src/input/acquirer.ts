import type { SpeechCapture } from "../audio/types";
import {
  AudioCaptureError,
  RecognitionTimeoutError,
  RecognitionUnintelligibleError,
  SpeechServiceError,
} from "../errors";
import { DEFAULT_SPEECH_LANGUAGE } from "../llm/transcribe";
import type { SpeechService } from "../llm/transcribe";
import { normalizeTranscript } from "../profile/normalize";
import { isYes } from "./console";
import type { Prompter } from "./console";

export type InputMode = "voice" | "text";

export interface Acquirer {
  readonly mode: InputMode;
  acquire(prompt: string): Promise<string>;
}

export type VoiceOptions = {
  capture: SpeechCapture;
  speech: SpeechService;
  language?: string;
  retries?: number;
};

export const VOICE_RETRIES = 3;

/**
 * Gets the raw answer for one prompt. With voice options it listens,
 * transcribes and asks for confirmation, falling back to typing when the
 * attempts run out or the speech backend is unavailable.
 */
export class InputAcquirer implements Acquirer {
  constructor(
    private readonly prompter: Prompter,
    private readonly voice?: VoiceOptions
  ) {}

  get mode(): InputMode {
    return this.voice ? "voice" : "text";
  }

  acquire(prompt: string): Promise<string> {
    return this.voice
      ? this.acquireByVoice(prompt, this.voice)
      : this.acquireByText(prompt);
  }

  async acquireByText(prompt: string): Promise<string> {
    const answer = await this.prompter.ask(`\n${prompt}\n> `);
    return answer.trim();
  }

  private async acquireByVoice(
    prompt: string,
    voice: VoiceOptions
  ): Promise<string> {
    const retries = voice.retries ?? VOICE_RETRIES;
    const language = voice.language ?? DEFAULT_SPEECH_LANGUAGE;

    for (let attempt = 1; attempt <= retries; attempt++) {
      this.prompter.say(`\n${prompt} (Attempt ${attempt}/${retries})`);
      try {
        this.prompter.say("Adjusting for ambient noise...");
        const audio = await voice.capture.capture({
          onListening: () => this.prompter.say("Listening..."),
        });
        const transcript = normalizeTranscript(
          prompt,
          await voice.speech.transcribe(audio, language)
        );

        this.prompter.say(`Recognized: '${transcript}'`);
        if (isYes(await this.prompter.ask("Is this correct? (y/n): "))) {
          return transcript;
        }
      } catch (error) {
        if (error instanceof RecognitionTimeoutError) {
          this.prompter.warn("No speech detected. Please speak louder.");
        } else if (error instanceof RecognitionUnintelligibleError) {
          this.prompter.warn("Could not understand. Please speak clearly.");
        } else if (
          error instanceof SpeechServiceError ||
          error instanceof AudioCaptureError
        ) {
          this.prompter.warn(`Voice input unavailable: ${error.message}`);
          return this.acquireByText(prompt);
        } else {
          throw error;
        }
      }
    }

    this.prompter.say("\nSwitching to text input...");
    return this.acquireByText(prompt);
  }
}
