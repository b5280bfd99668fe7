export type WizardErrorKind =
  | "recognition_timeout"
  | "recognition_unintelligible"
  | "speech_service"
  | "audio_capture"
  | "persistence"
  | "operator_interrupt";

/** Base class for the failures the wizard knows how to recover from (or deliberately doesn't). */
export class ProfileWizardError extends Error {
  constructor(
    readonly kind: WizardErrorKind,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RecognitionTimeoutError extends ProfileWizardError {
  constructor(message = "No speech detected before the listen timeout") {
    super("recognition_timeout", message);
  }
}

export class RecognitionUnintelligibleError extends ProfileWizardError {
  constructor(message = "Speech could not be understood") {
    super("recognition_unintelligible", message);
  }
}

// Transport, auth or availability failure of the speech backend.
export class SpeechServiceError extends ProfileWizardError {
  constructor(message: string, options?: ErrorOptions) {
    super("speech_service", message, options);
  }
}

export class AudioCaptureError extends ProfileWizardError {
  constructor(message: string, options?: ErrorOptions) {
    super("audio_capture", message, options);
  }
}

export class PersistenceError extends ProfileWizardError {
  constructor(message: string, options?: ErrorOptions) {
    super("persistence", message, options);
  }
}

export class OperatorInterruptError extends ProfileWizardError {
  constructor(message = "Profile creation cancelled") {
    super("operator_interrupt", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
