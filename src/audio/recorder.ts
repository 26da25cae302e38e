import { mkdir, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { RecordingFailedError, describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type { AudioStreamHandlers, IAudioSource, IAudioStream } from "../types/contracts";
import { SilenceDetector, type SilenceOptions } from "./silenceDetector";
import { encodeWav, sampleCount } from "./wav";

export interface RecorderOptions {
  source: IAudioSource;
  sampleRateHz: number;
  channels: number;
  inputDevice?: string;
  silence?: SilenceOptions & { enabled: boolean };
  /** How long stop() waits for in-flight frames after closing the stream. */
  graceMs: number;
  logger: Logger;
  clock?: () => number;
}

export interface DrainedRecording {
  path: string;
  framesWritten: number;
  samples: number;
}

export class Recorder {
  private stream: IAudioStream | undefined;
  private frames: Buffer[] | undefined;
  private recording = false;
  private onSilence: (() => void) | undefined;
  private readonly detector: SilenceDetector | undefined;

  constructor(private readonly options: RecorderOptions) {
    this.detector = options.silence?.enabled
      ? new SilenceDetector(options.silence, options.clock)
      : undefined;
  }

  get isRecording(): boolean {
    return this.recording;
  }

  get silenceDetectionEnabled(): boolean {
    return this.detector !== undefined;
  }

  /** Opens the input stream; `onSilence` fires at most once per session, off the frame path. */
  async start(onSilence?: () => void): Promise<void> {
    if (this.frames) {
      throw new RecordingFailedError("Already recording");
    }

    this.frames = [];
    this.detector?.reset();
    this.onSilence = onSilence;

    const handlers: AudioStreamHandlers = {
      onFrame: (pcm16) => this.handleFrame(pcm16),
      onError: (error) => this.options.logger.warn("Audio stream error", { error: error.message })
    };

    let stream: IAudioStream;
    try {
      stream = await this.openWithFallback(handlers);
    } catch (error) {
      this.frames = undefined;
      this.onSilence = undefined;
      throw error;
    }

    this.stream = stream;
    this.recording = true;
    this.options.logger.info("Recording started", {
      device: stream.device ?? "default",
      silenceDetection: this.detector !== undefined
    });
  }

  /** Closes the stream and drains buffered frames, in arrival order, to a WAV file. */
  async stop(outputPath: string): Promise<DrainedRecording> {
    if (!this.recording || !this.frames) {
      throw new RecordingFailedError("Not currently recording");
    }

    const { logger, graceMs, sampleRateHz, channels } = this.options;
    const frames = this.frames;
    const stream = this.stream;
    this.stream = undefined;
    this.recording = false;
    this.onSilence = undefined;

    try {
      try {
        await stream?.close();
      } catch (error) {
        throw new RecordingFailedError(`Failed to close audio stream: ${describeError(error)}`, {
          cause: error
        });
      }

      if (graceMs > 0) {
        await delay(graceMs);
      }

      this.frames = undefined;

      await mkdir(dirname(outputPath), { recursive: true });

      if (frames.length === 0) {
        await rm(outputPath, { force: true });
        logger.warn("No audio data was recorded", { path: outputPath });
        throw new RecordingFailedError("No audio data was recorded");
      }

      const pcm16 = Buffer.concat(frames);
      try {
        await writeFile(outputPath, encodeWav(pcm16, sampleRateHz, channels));
      } catch (error) {
        await rm(outputPath, { force: true });
        throw new RecordingFailedError(`Failed to save recording: ${describeError(error)}`, {
          cause: error
        });
      }

      const drained = { path: outputPath, framesWritten: frames.length, samples: sampleCount(pcm16) };
      logger.info("Recording saved", { ...drained });
      return drained;
    } finally {
      this.frames = undefined;
      this.detector?.reset();
    }
  }

  private handleFrame(pcm16: Buffer): void {
    if (!this.frames) {
      return;
    }
    this.frames.push(Buffer.from(pcm16));

    if (this.recording && this.detector?.observe(pcm16)) {
      const onSilence = this.onSilence;
      this.options.logger.info("Sustained silence detected", {
        durationMs: this.options.silence?.durationMs
      });
      if (onSilence) {
        setImmediate(onSilence);
      }
    }
  }

  private async openWithFallback(handlers: AudioStreamHandlers): Promise<IAudioStream> {
    const { source, inputDevice, logger } = this.options;
    try {
      return await source.open(inputDevice, handlers);
    } catch (error) {
      logger.error("Failed to open audio stream", {
        device: inputDevice ?? "default",
        error: describeError(error)
      });

      const fallback = await source.findFallbackDevice(inputDevice);
      if (fallback === undefined) {
        throw new RecordingFailedError(`Failed to open audio input: ${describeError(error)}`, {
          cause: error
        });
      }

      logger.info("Retrying audio stream with fallback device", { device: fallback });
      try {
        return await source.open(fallback, handlers);
      } catch (fallbackError) {
        logger.error("Fallback audio device also failed", {
          device: fallback,
          error: describeError(fallbackError)
        });
        throw new RecordingFailedError(
          `Failed to open audio input: ${describeError(fallbackError)}`,
          { cause: fallbackError }
        );
      }
    }
  }
}
