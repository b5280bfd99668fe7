import { spawn } from "child_process";
import { AudioCaptureError, OperatorInterruptError } from "../errors";
import { rechunk } from "./pcm";
import { DEFAULT_AUDIO_FORMAT } from "./types";
import type { AudioFormat, AudioSource, AudioStream } from "./types";

/**
 * Microphone input through sox's `rec`, read as raw PCM from its stdout.
 * One recorder process per opened stream; closing the stream kills it.
 */
export class SoxMicrophone implements AudioSource {
  constructor(
    readonly format: AudioFormat = DEFAULT_AUDIO_FORMAT,
    private readonly command = "rec"
  ) {}

  open(signal?: AbortSignal): AudioStream {
    if (signal?.aborted) throw new OperatorInterruptError();

    const recorder = spawn(
      this.command,
      [
        "-q",
        "-t", "raw",
        "-b", String(this.format.sampleWidth * 8),
        "-e", "signed-integer",
        "-L",
        "-c", "1",
        "-r", String(this.format.sampleRate),
        "-",
      ],
      { stdio: ["ignore", "pipe", "ignore"] }
    );

    recorder.on("error", (err) => {
      recorder.stdout.destroy(
        new AudioCaptureError(`Could not start ${this.command}: ${err.message}`, {
          cause: err,
        })
      );
    });
    const onAbort = () => recorder.stdout.destroy(new OperatorInterruptError());
    signal?.addEventListener("abort", onAbort, { once: true });

    const chunks = rechunk(
      recorder.stdout,
      this.format.chunkFrames * this.format.sampleWidth
    );

    return {
      read: async () => {
        const next = await chunks.next();
        return next.done ? null : next.value;
      },
      close: async () => {
        signal?.removeEventListener("abort", onAbort);
        recorder.kill();
        await chunks.return(undefined);
      },
    };
  }
}
