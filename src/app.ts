import { join } from "node:path";
import { DrafterAgent } from "./agents/drafter";
import { SearcherAgent } from "./agents/searcher";
import { SynthesizerAgent } from "./agents/synthesizer";
import { Recorder } from "./audio/recorder";
import { SpawnedAudioSource } from "./audio/spawnedAudioSource";
import { SecretsManager } from "./config/secrets";
import type { InsightCapsuleSettings } from "./config/settings";
import { describeError } from "./errors";
import { HybridGenerator, type BackendAvailability } from "./generation/hybridGenerator";
import { OllamaGenerator } from "./generation/ollamaGenerator";
import { OpenAiGenerator } from "./generation/openAiGenerator";
import {
  FileLogSink,
  StreamLogSink,
  createLogger,
  type LogSink,
  type Logger
} from "./logging/logger";
import { InsightCaptureOrchestrator } from "./orchestration/insightCaptureOrchestrator";
import { CapsuleLogStore } from "./storage/capsuleLogStore";
import { FuseInsightIndex } from "./storage/fuseInsightIndex";
import { HttpTranscriber } from "./stt/httpTranscriber";
import { WhisperCppTranscriber, findWhisperCppBinary } from "./stt/whisperCppTranscriber";
import type { IAudioSource, ITextGenerator, ITranscriber } from "./types/contracts";

export interface AppOverrides {
  env?: Record<string, string | undefined>;
  audioSource?: IAudioSource;
  transcriber?: ITranscriber;
  generator?: ITextGenerator;
}

export interface InsightCaptureApp {
  settings: InsightCapsuleSettings;
  orchestrator: InsightCaptureOrchestrator;
  store: CapsuleLogStore;
  drafter: DrafterAgent;
  searcher: SearcherAgent | undefined;
  availability: BackendAvailability;
  dispose(): Promise<void>;
}

export function createAppLogging(
  settings: InsightCapsuleSettings,
  out: NodeJS.WritableStream = process.stderr
): Logger {
  const sinks: LogSink[] = [
    new StreamLogSink(out),
    new FileLogSink(join(settings.dataDir, "logs", "system"))
  ];
  return createLogger({ sinks, level: settings.logLevel, scope: "insight-capsule" });
}

export async function createInsightCaptureApp(
  settings: InsightCapsuleSettings,
  logger: Logger,
  overrides: AppOverrides = {}
): Promise<InsightCaptureApp> {
  const generationLogger = logger.child("generation");
  let availability: BackendAvailability = { local: false, remote: false };
  let generator = overrides.generator;
  if (!generator) {
    const apiKey = await new SecretsManager(overrides.env).getOpenAiApiKey();
    const hybrid = await HybridGenerator.create({
      preferLocal: settings.preferLocal,
      defaults: { temperature: settings.defaultTemperature, maxRetries: settings.maxRetries },
      logger: generationLogger,
      createLocal: () =>
        new OllamaGenerator({
          baseUrl: settings.localLlmUrl,
          model: settings.localLlmModel,
          timeoutMs: settings.localTimeoutMs,
          probeTimeoutMs: settings.localProbeTimeoutMs,
          logger: generationLogger.child("ollama")
        }),
      createRemote: () =>
        new OpenAiGenerator({
          apiKey,
          baseUrl: settings.openAiBaseUrl,
          models: settings.remoteModels,
          timeoutMs: settings.openAiTimeoutMs,
          logger: generationLogger.child("openai")
        })
    });
    availability = hybrid.availability;
    generator = hybrid;
  }

  const store = new CapsuleLogStore(join(settings.dataDir, "logs"), logger.child("storage"));

  let index: FuseInsightIndex | undefined;
  if (settings.searchEnabled) {
    index = await FuseInsightIndex.open(
      join(settings.dataDir, "index", "insights.json"),
      logger.child("index")
    );
  }

  const recorder = new Recorder({
    source:
      overrides.audioSource ??
      new SpawnedAudioSource({
        sampleRateHz: settings.audioSampleRateHz,
        channels: settings.audioChannels,
        logger: logger.child("audio")
      }),
    sampleRateHz: settings.audioSampleRateHz,
    channels: settings.audioChannels,
    inputDevice: settings.audioInputDevice,
    silence: {
      enabled: settings.silenceDetectionEnabled,
      threshold: settings.silenceThreshold,
      durationMs: settings.silenceDurationMs
    },
    graceMs: settings.stopGraceMs,
    logger: logger.child("recorder")
  });

  const orchestrator = new InsightCaptureOrchestrator({
    recorder,
    transcriber: overrides.transcriber ?? (await resolveTranscriber(settings, logger.child("stt"))),
    synthesizer: new SynthesizerAgent(generator),
    store,
    index,
    captureDir: join(settings.dataDir, "input_voice"),
    maxCapsuleWords: settings.maxCapsuleWords,
    logger: logger.child("pipeline")
  });

  const agentLogger = logger.child("agents");

  return {
    settings,
    orchestrator,
    store,
    drafter: new DrafterAgent(generator, agentLogger),
    searcher: index ? new SearcherAgent(index, generator, agentLogger) : undefined,
    availability,
    async dispose() {
      if (orchestrator.isRecording) {
        await orchestrator.stopRecording();
      }
      await orchestrator.whenIdle();
      logger.info("Shutting down");
    }
  };
}

async function resolveTranscriber(
  settings: InsightCapsuleSettings,
  logger: Logger
): Promise<ITranscriber> {
  if (settings.sttProvider === "http") {
    return new HttpTranscriber({
      endpoint: settings.sttHttpEndpoint,
      timeoutMs: settings.sttTimeoutMs,
      sampleRateHz: settings.audioSampleRateHz,
      channels: settings.audioChannels,
      logger
    });
  }

  let binaryPath: string | undefined;
  try {
    binaryPath = await findWhisperCppBinary(settings.sttWhisperCppPath || undefined);
  } catch (error) {
    logger.warn("whisper.cpp lookup failed", { error: describeError(error) });
  }
  if (!binaryPath) {
    logger.warn("whisper.cpp binary not found; transcription will fail until it is installed", {
      hint: installHint()
    });
  }

  return new WhisperCppTranscriber({
    binaryPath: binaryPath ?? "whisper-cli",
    modelPath: settings.sttModelPath,
    language: settings.sttLanguage,
    timeoutMs: settings.sttTimeoutMs,
    logger
  });
}

function installHint(): string {
  if (process.platform === "darwin") {
    return "brew install whisper-cpp";
  }
  if (process.platform === "linux") {
    return "build whisper.cpp and put whisper-cli on PATH, or set STT_WHISPER_CPP_PATH";
  }
  return "download whisper.cpp and set STT_WHISPER_CPP_PATH";
}

export { readSettings, type InsightCapsuleSettings } from "./config/settings";
export type { ProcessingResult, PipelineObserver, PipelineState } from "./types/contracts";
