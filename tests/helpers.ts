import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger, MemoryLogSink, type Logger } from "../src/logging/logger";
import type {
  AudioStreamHandlers,
  IAudioSource,
  IAudioStream,
  ILocalGenerationBackend,
  ResolvedGenerationRequest
} from "../src/types/contracts";

export function memoryLogger(level: "debug" | "info" = "debug"): { logger: Logger; sink: MemoryLogSink } {
  const sink = new MemoryLogSink();
  const logger = createLogger({
    sinks: [sink],
    level,
    now: () => new Date("2024-01-02T03:04:05.000Z")
  });
  return { logger, sink };
}

export async function withTempDir(prefix = "insight-"): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

/** PCM16 with alternating ±amplitude samples, so its RMS equals `amplitude`. */
export function tone(samples: number, amplitude: number): Buffer {
  const buf = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i++) {
    buf.writeInt16LE(i % 2 === 0 ? amplitude : -amplitude, i * 2);
  }
  return buf;
}

export function pcm(values: number[]): Buffer {
  const buf = Buffer.alloc(values.length * 2);
  values.forEach((v, i) => buf.writeInt16LE(v, i * 2));
  return buf;
}

export function readSamples(pcm16: Buffer): number[] {
  const out: number[] = [];
  for (let i = 0; i + 1 < pcm16.length; i += 2) {
    out.push(pcm16.readInt16LE(i));
  }
  return out;
}

export class ManualClock {
  time = 0;
  readonly now = (): number => this.time;
}

/** In-process audio input: tests push frames with `emit`. */
export class FakeAudioSource implements IAudioSource {
  readonly opened: Array<string | undefined> = [];
  readonly failingDevices = new Set<string | undefined>();
  fallbackDevice: string | undefined = undefined;
  closeCount = 0;
  private handlers: AudioStreamHandlers | undefined;

  async open(device: string | undefined, handlers: AudioStreamHandlers): Promise<IAudioStream> {
    this.opened.push(device);
    if (this.failingDevices.has(device)) {
      throw new Error(`device ${device ?? "default"} unavailable`);
    }
    this.handlers = handlers;
    return {
      device,
      close: async () => {
        this.closeCount++;
        this.handlers = undefined;
      }
    };
  }

  async findFallbackDevice(exclude: string | undefined): Promise<string | undefined> {
    return this.fallbackDevice === exclude ? undefined : this.fallbackDevice;
  }

  emit(frame: Buffer): void {
    this.handlers?.onFrame(frame);
  }
}

export class FakeLocalBackend implements ILocalGenerationBackend {
  readonly name = "ollama" as const;
  readonly requests: ResolvedGenerationRequest[] = [];
  available = true;
  reply: string | Error = "local text";

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async generate(request: ResolvedGenerationRequest): Promise<string> {
    this.requests.push(request);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
