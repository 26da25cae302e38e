import { spawn, type ChildProcess } from "node:child_process";
import { RecordingFailedError } from "../errors";
import type { Logger } from "../logging/logger";
import type { AudioStreamHandlers, IAudioSource, IAudioStream } from "../types/contracts";
import { commandExists } from "../utils";
import { createSampleAligner } from "./wav";

type RecorderBackend = "sox" | "arecord" | "ffmpeg";

interface RecorderInfo {
  backend: RecorderBackend;
  binaryPath: string;
}

interface SpawnedAudioSourceOptions {
  sampleRateHz: number;
  channels: number;
  logger: Logger;
  startTimeoutMs?: number;
}

const STOP_TIMEOUT_MS = 2000;

/** Captures raw 16-bit PCM from a command-line recorder writing to stdout. */
export class SpawnedAudioSource implements IAudioSource {
  private detectedRecorder?: RecorderInfo;
  private detectionDone = false;

  constructor(private readonly options: SpawnedAudioSourceOptions) {}

  async open(device: string | undefined, handlers: AudioStreamHandlers): Promise<IAudioStream> {
    const recorder = await this.resolveRecorder();
    const args = buildRecorderArgs(recorder.backend, device, this.options);
    this.options.logger.debug("Spawning recorder", {
      backend: recorder.backend,
      device: device ?? "default"
    });

    const proc = spawn(recorder.binaryPath, args, { stdio: ["ignore", "pipe", "pipe"] });
    return waitForFirstChunk(proc, device, handlers, this.options.startTimeoutMs ?? 3000);
  }

  async findFallbackDevice(exclude: string | undefined): Promise<string | undefined> {
    if (exclude === undefined) {
      return undefined;
    }
    const recorder = await this.resolveRecorder();
    const fallback = defaultDeviceName(recorder.backend);
    return fallback === exclude ? undefined : fallback;
  }

  private async resolveRecorder(): Promise<RecorderInfo> {
    if (!this.detectionDone) {
      this.detectedRecorder = await detectRecorder();
      this.detectionDone = true;
    }
    if (!this.detectedRecorder) {
      throw new RecordingFailedError(`No audio recorder found: ${platformAudio().installHint}`);
    }
    return this.detectedRecorder;
  }
}

class SpawnedAudioStream implements IAudioStream {
  private stopRequested = false;

  constructor(
    readonly device: string | undefined,
    private readonly proc: ChildProcess
  ) {}

  get isStopping(): boolean {
    return this.stopRequested;
  }

  close(): Promise<void> {
    this.stopRequested = true;
    const proc = this.proc;
    if (proc.exitCode !== null || proc.signalCode !== null) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const forceKill = setTimeout(() => proc.kill("SIGKILL"), STOP_TIMEOUT_MS);
      proc.once("close", () => {
        clearTimeout(forceKill);
        resolve();
      });
      proc.kill("SIGTERM");
    });
  }
}

function waitForFirstChunk(
  proc: ChildProcess,
  device: string | undefined,
  handlers: AudioStreamHandlers,
  startTimeoutMs: number
): Promise<IAudioStream> {
  return new Promise((resolve, reject) => {
    const stream = new SpawnedAudioStream(device, proc);
    let opened = false;
    let stderrData = "";

    const fail = (message: string): void => {
      clearTimeout(startTimer);
      if (!opened) {
        opened = true;
        reject(new RecordingFailedError(message));
      }
    };

    const startTimer = setTimeout(() => {
      proc.kill("SIGTERM");
      fail(`No audio received within ${startTimeoutMs}ms`);
    }, startTimeoutMs);

    proc.on("error", (err) => {
      if (opened) {
        handlers.onError(err);
        return;
      }
      fail(`Recording failed to start: ${err.message}`);
    });

    proc.stderr?.on("data", (chunk: Buffer) => {
      stderrData += chunk.toString();
    });

    const align = createSampleAligner();
    proc.stdout?.on("data", (chunk: Buffer) => {
      if (!opened) {
        opened = true;
        clearTimeout(startTimer);
        resolve(stream);
      }
      const frame = align(chunk);
      if (frame) {
        handlers.onFrame(frame);
      }
    });

    proc.on("close", (code, signal) => {
      const excerpt = stderrData.slice(0, 300).trim();
      if (!opened) {
        fail(`Recorder exited with code ${code}: ${excerpt}`);
        return;
      }
      if (!stream.isStopping) {
        handlers.onError(new Error(`Recorder exited unexpectedly (code ${code}, signal ${signal}) ${excerpt}`));
      }
    });
  });
}

interface PlatformAudio {
  recorders: RecorderBackend[];
  soxDriver: string;
  ffmpegFormat: string;
  ffmpegDevice: string;
  installHint: string;
}

const LINUX_AUDIO: PlatformAudio = {
  recorders: ["arecord", "sox", "ffmpeg"],
  soxDriver: "alsa",
  ffmpegFormat: "pulse",
  ffmpegDevice: "default",
  installHint: "install alsa-utils (arecord) or SoX"
};

const PLATFORM_AUDIO: Partial<Record<NodeJS.Platform, PlatformAudio>> = {
  linux: LINUX_AUDIO,
  darwin: {
    recorders: ["sox", "ffmpeg"],
    soxDriver: "coreaudio",
    ffmpegFormat: "avfoundation",
    ffmpegDevice: ":default",
    installHint: "brew install sox"
  },
  win32: {
    recorders: ["ffmpeg", "sox"],
    soxDriver: "waveaudio",
    ffmpegFormat: "dshow",
    ffmpegDevice: "audio=default",
    installHint: "winget install ffmpeg"
  }
};

function platformAudio(): PlatformAudio {
  return PLATFORM_AUDIO[process.platform] ?? LINUX_AUDIO;
}

function buildRecorderArgs(
  backend: RecorderBackend,
  device: string | undefined,
  options: SpawnedAudioSourceOptions
): string[] {
  const rate = String(options.sampleRateHz);
  const channels = String(options.channels);
  const platform = platformAudio();
  if (backend === "arecord") {
    const deviceArgs = device ? ["-D", device] : [];
    return ["-q", ...deviceArgs, "-t", "raw", "-f", "S16_LE", "-c", channels, "-r", rate];
  }
  if (backend === "sox") {
    const input = device ? ["-t", platform.soxDriver, device] : ["-d"];
    return ["-q", ...input, "-t", "raw", "-e", "signed-integer", "-b", "16", "-c", channels, "-r", rate, "-"];
  }
  return [
    "-hide_banner", "-loglevel", "error",
    "-f", platform.ffmpegFormat, "-i", device ?? platform.ffmpegDevice,
    "-ac", channels, "-ar", rate, "-acodec", "pcm_s16le", "-f", "s16le", "pipe:1"
  ];
}

function defaultDeviceName(backend: RecorderBackend): string {
  return backend === "ffmpeg" ? platformAudio().ffmpegDevice : "default";
}

async function detectRecorder(): Promise<RecorderInfo | undefined> {
  for (const backend of platformAudio().recorders) {
    if (await commandExists(backend)) {
      return { backend, binaryPath: backend };
    }
  }
  return undefined;
}
