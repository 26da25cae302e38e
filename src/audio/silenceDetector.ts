import { rmsAmplitude } from "./wav";

export interface SilenceOptions {
  /** RMS on signed 16-bit samples; frames below it count as silent. */
  threshold: number;
  durationMs: number;
}

/**
 * Tracks how long frames have stayed below the threshold. `observe` reports
 * sustained silence once; later frames report nothing until `reset`.
 */
export class SilenceDetector {
  private silenceStartedAt: number | undefined;
  private triggered = false;

  constructor(
    private readonly options: SilenceOptions,
    private readonly clock: () => number = Date.now
  ) {}

  get hasTriggered(): boolean {
    return this.triggered;
  }

  observe(pcm16: Buffer): boolean {
    if (this.triggered) {
      return false;
    }

    if (rmsAmplitude(pcm16) >= this.options.threshold) {
      this.silenceStartedAt = undefined;
      return false;
    }

    const now = this.clock();
    if (this.silenceStartedAt === undefined) {
      this.silenceStartedAt = now;
      return false;
    }

    if (now - this.silenceStartedAt >= this.options.durationMs) {
      this.triggered = true;
      return true;
    }
    return false;
  }

  reset(): void {
    this.silenceStartedAt = undefined;
    this.triggered = false;
  }
}
