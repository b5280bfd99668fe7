import {
  createPartFromBase64,
  createUserContent,
  GoogleGenAI,
} from "@google/genai";
import type { GenerateContentParameters } from "@google/genai";
import { encodeWav } from "../audio/wav";
import type { CapturedAudio } from "../audio/types";
import {
  errorMessage,
  OperatorInterruptError,
  RecognitionUnintelligibleError,
  SpeechServiceError,
} from "../errors";

export const DEFAULT_SPEECH_LANGUAGE = "en-US";

export interface SpeechService {
  transcribe(audio: CapturedAudio, language: string): Promise<string>;
}

// The slice of `ai.models` used here; lets tests pass a stub.
export interface TranscriptionModel {
  generateContent(
    params: GenerateContentParameters
  ): Promise<{ text?: string }>;
}

function transcriptionInstruction(language: string) {
  return (
    `Transcribe this audio verbatim in ${language}. Output only the transcript text. ` +
    "If there is no intelligible speech, output nothing."
  );
}

export class GeminiSpeechService implements SpeechService {
  constructor(
    private readonly models: TranscriptionModel,
    private readonly model: string,
    private readonly signal?: AbortSignal
  ) {}

  static fromApiKey(apiKey: string, model: string, signal?: AbortSignal) {
    const ai = new GoogleGenAI({ apiKey });
    return new GeminiSpeechService(ai.models, model, signal);
  }

  async transcribe(audio: CapturedAudio, language: string): Promise<string> {
    const wav = encodeWav(audio.pcm, audio.format);

    let response: { text?: string };
    try {
      response = await this.models.generateContent({
        model: this.model,
        contents: createUserContent([
          createPartFromBase64(wav.toString("base64"), "audio/wav"),
          transcriptionInstruction(language),
        ]),
        config: { abortSignal: this.signal },
      });
    } catch (error) {
      if (this.signal?.aborted) throw new OperatorInterruptError();
      throw new SpeechServiceError(errorMessage(error), { cause: error });
    }

    const transcript = response.text?.trim();
    if (!transcript) throw new RecognitionUnintelligibleError();
    return transcript;
  }
}
