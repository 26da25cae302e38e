import { join } from "node:path";
import { setImmediate as nextTick } from "node:timers/promises";
import type { SynthesizerAgent } from "../agents/synthesizer";
import type { Recorder } from "../audio/recorder";
import { describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type {
  ICapsuleStore,
  IInsightIndex,
  ITranscriber,
  PipelineObserver,
  PipelineState,
  ProcessingResult
} from "../types/contracts";
import { compactTimestamp, countWords } from "../utils";
import { SerialLock } from "./serialLock";

export const UNTITLED_INSIGHT = "Untitled Insight";
export const SILENT_AUDIO_PLACEHOLDER = "User provided silent or very short audio.";
const TITLE_WORDS = 5;

interface Dependencies {
  recorder: Recorder;
  transcriber: ITranscriber;
  synthesizer: SynthesizerAgent;
  store: ICapsuleStore;
  index?: IInsightIndex;
  captureDir: string;
  maxCapsuleWords: number;
  logger: Logger;
  now?: () => Date;
}

/**
 * Idle → Recording → Processing → Idle. Transitions run under one lock;
 * processing runs after the stopping call has returned.
 */
export class InsightCaptureOrchestrator {
  private current: PipelineState = "idle";
  private readonly lock = new SerialLock();
  private readonly observers = new Set<Partial<PipelineObserver>>();
  private processingRun: Promise<void> | undefined;

  constructor(private readonly deps: Dependencies) {}

  get state(): PipelineState {
    return this.current;
  }

  get isRecording(): boolean {
    return this.current === "recording";
  }

  get isProcessing(): boolean {
    return this.current === "processing";
  }

  get isBusy(): boolean {
    return this.current !== "idle";
  }

  subscribe(observer: Partial<PipelineObserver>): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  startRecording(): Promise<boolean> {
    return this.lock.run(async () => {
      const { recorder, logger } = this.deps;
      if (this.current !== "idle") {
        logger.warn("Start ignored", { state: this.current });
        return false;
      }

      try {
        await recorder.start(() => this.handleSilence());
      } catch (error) {
        const message = `Failed to start recording: ${describeError(error)}`;
        logger.error(message);
        this.emit("onError", (o) => o.onError?.(message));
        return false;
      }

      this.current = "recording";
      this.emit("onRecordingStart", (o) => o.onRecordingStart?.());
      return true;
    });
  }

  stopRecording(): Promise<boolean> {
    return this.lock.run(async () => {
      const { recorder, logger, captureDir } = this.deps;
      if (this.current !== "recording") {
        logger.warn("Stop ignored", { state: this.current });
        return false;
      }

      const target = join(captureDir, `capture-${compactTimestamp(this.now())}.wav`);
      let audioPath: string;
      try {
        audioPath = (await recorder.stop(target)).path;
      } catch (error) {
        this.current = "idle";
        const message = `Recording failed: ${describeError(error)}`;
        logger.error(message);
        this.emit("onError", (o) => o.onError?.(message));
        return false;
      }

      this.current = "processing";
      this.emit("onRecordingStop", (o) => o.onRecordingStop?.());
      this.scheduleProcessing(audioPath);
      return true;
    });
  }

  /** Hotkey semantics: stop when recording, start when idle, refuse while processing. */
  async toggle(): Promise<boolean> {
    switch (this.current) {
      case "recording":
        return this.stopRecording();
      case "idle":
        return this.startRecording();
      case "processing":
        this.deps.logger.info("Still processing the previous recording");
        return false;
    }
  }

  /** Processes an existing recording, as if it had just been captured. */
  processFile(audioPath: string): Promise<boolean> {
    return this.lock.run(() => {
      if (this.current !== "idle") {
        this.deps.logger.warn("Process ignored", { state: this.current });
        return false;
      }
      this.current = "processing";
      this.scheduleProcessing(audioPath);
      return true;
    });
  }

  /** Resolves once no processing run is in flight. */
  async whenIdle(): Promise<void> {
    while (this.processingRun) {
      await this.processingRun;
    }
  }

  private handleSilence(): void {
    this.deps.logger.info("Auto-stopping after sustained silence");
    this.stopRecording().catch((error: unknown) => {
      this.deps.logger.error("Auto-stop failed", { error: describeError(error) });
    });
  }

  private scheduleProcessing(audioPath: string): void {
    const run = nextTick().then(() => this.process(audioPath));
    this.processingRun = run;
  }

  private async process(audioPath: string): Promise<void> {
    this.emit("onProcessingStart", (o) => o.onProcessingStart?.());

    let result: ProcessingResult | undefined;
    let failure = "";
    try {
      result = await this.runPipeline(audioPath);
    } catch (error) {
      failure = describeError(error);
      this.deps.logger.error("Processing failed", { path: audioPath, error: failure });
    } finally {
      await this.lock.run(() => {
        this.current = "idle";
        this.processingRun = undefined;
      });
    }

    if (result) {
      const completed = result;
      this.emit("onProcessingComplete", (o) => o.onProcessingComplete?.(completed));
    } else {
      const message = `Processing failed: ${failure}`;
      this.emit("onError", (o) => o.onError?.(message));
    }
  }

  private async runPipeline(audioPath: string): Promise<ProcessingResult> {
    const { transcriber, synthesizer, store, index, maxCapsuleWords, logger } = this.deps;

    const transcript = (await transcriber.transcribe(audioPath)).trim();
    logger.info("Transcribed", { words: countWords(transcript) });

    const title = deriveTitle(transcript);
    const capsule = await synthesizer.generateCapsule(transcript || SILENT_AUDIO_PLACEHOLDER, maxCapsuleWords);

    const tags = store.extractTags(transcript);
    const timestamp = this.now();
    const logPath = await store.saveLog({ title, transcript, capsule, tags, timestamp });

    if (index) {
      const indexed = await index
        .add(logPath, transcript, capsule, {
          title,
          tags,
          timestamp: timestamp.toISOString(),
          logPath
        })
        .catch((error: unknown) => {
          logger.warn("Indexing failed", { error: describeError(error) });
          return false;
        });
      logger.debug("Index updated", { indexed });
    }

    return { success: true, audioPath, transcript, title, capsule, tags, logPath };
  }

  private emit(event: keyof PipelineObserver, call: (observer: Partial<PipelineObserver>) => void): void {
    for (const observer of this.observers) {
      try {
        call(observer);
      } catch (error) {
        this.deps.logger.warn("Observer threw", { event, error: describeError(error) });
      }
    }
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }
}

export function deriveTitle(transcript: string): string {
  const words = transcript.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) {
    return UNTITLED_INSIGHT;
  }
  const title = words.slice(0, TITLE_WORDS).join(" ");
  return words.length > TITLE_WORDS ? `${title}...` : title;
}
