#!/usr/bin/env node
import { MicrophoneCapture } from "./audio/capture";
import { SoxMicrophone } from "./audio/microphone";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { errorMessage, OperatorInterruptError } from "./errors";
import { InputAcquirer } from "./input/acquirer";
import type { InputMode } from "./input/acquirer";
import { ConsolePrompter } from "./input/console";
import type { Prompter } from "./input/console";
import { GeminiSpeechService } from "./llm/transcribe";
import { ProfileWizard } from "./profile/wizard";
import { RecordStore } from "./storage/recordStore";

function createAcquirer(
  mode: InputMode,
  config: AppConfig,
  prompter: Prompter,
  signal: AbortSignal
) {
  if (mode === "text") return new InputAcquirer(prompter);
  if (!config.geminiApiKey) {
    prompter.warn(
      "Voice input unavailable: GEMINI_API_KEY is not set. Using text input."
    );
    return new InputAcquirer(prompter);
  }
  return new InputAcquirer(prompter, {
    capture: new MicrophoneCapture(new SoxMicrophone(), undefined, signal),
    speech: GeminiSpeechService.fromApiKey(
      config.geminiApiKey,
      config.geminiModel,
      signal
    ),
  });
}

async function main(): Promise<number> {
  const controller = new AbortController();
  const interrupt = () => controller.abort();
  process.once("SIGINT", interrupt);
  const prompter = new ConsolePrompter(controller.signal, interrupt);

  try {
    const config = loadConfig();
    const wizard = new ProfileWizard({
      prompter,
      store: new RecordStore(),
      acquirerFor: (mode) =>
        createAcquirer(mode, config, prompter, controller.signal),
    });
    await wizard.run();
    return 0;
  } catch (error) {
    if (error instanceof OperatorInterruptError) {
      prompter.warn("\n\nProfile creation cancelled.");
      return 130;
    }
    prompter.warn(`\nError: ${errorMessage(error)}`);
    return 1;
  } finally {
    process.removeListener("SIGINT", interrupt);
    prompter.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Unexpected failure:", error);
    process.exitCode = 1;
  }
);
