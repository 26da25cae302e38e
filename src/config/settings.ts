import { resolve } from "node:path";
import { LOG_LEVELS, type LogLevel } from "../logging/logger";
import type { GenerationRole } from "../types/contracts";
import { clamp, clampInt } from "../utils";

export type SttProvider = "whisper-cpp" | "http";

export interface InsightCapsuleSettings {
  dataDir: string;
  preferLocal: boolean;
  localLlmUrl: string;
  localLlmModel: string;
  localTimeoutMs: number;
  localProbeTimeoutMs: number;
  openAiBaseUrl: string;
  openAiTimeoutMs: number;
  remoteModels: Record<GenerationRole, string>;
  defaultTemperature: number;
  maxRetries: number;
  maxCapsuleWords: number;
  sttProvider: SttProvider;
  sttWhisperCppPath: string;
  sttModelPath: string;
  sttLanguage: string;
  sttHttpEndpoint: string;
  sttTimeoutMs: number;
  audioSampleRateHz: number;
  audioChannels: number;
  audioInputDevice: string | undefined;
  silenceDetectionEnabled: boolean;
  silenceThreshold: number;
  silenceDurationMs: number;
  stopGraceMs: number;
  searchEnabled: boolean;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export function readSettings(env: Env = process.env): InsightCapsuleSettings {
  const cfg = new EnvConfig(env);
  return {
    dataDir: resolve(cfg.get("INSIGHT_DATA_DIR", "./data")),
    preferLocal: cfg.getBoolean("USE_LOCAL_LLM", true),
    localLlmUrl: stripTrailingSlash(cfg.get("LOCAL_LLM_URL", "http://localhost:11434")),
    localLlmModel: cfg.get("LOCAL_LLM_MODEL", "llama3.2"),
    localTimeoutMs: cfg.getNumber("LOCAL_LLM_TIMEOUT_MS", 120_000),
    localProbeTimeoutMs: cfg.getNumber("LOCAL_LLM_PROBE_TIMEOUT_MS", 5_000),
    openAiBaseUrl: stripTrailingSlash(cfg.get("OPENAI_BASE_URL", "https://api.openai.com/v1")),
    openAiTimeoutMs: cfg.getNumber("OPENAI_TIMEOUT_MS", 60_000),
    remoteModels: {
      writing: cfg.get("GPT_MODEL_WRITING", "gpt-4o-mini"),
      fact_check: cfg.get("GPT_MODEL_FACT_CHECK", "gpt-4o-mini"),
      expander: cfg.get("GPT_MODEL_EXPANDER", "gpt-4o-mini")
    },
    defaultTemperature: clamp(cfg.getNumber("DEFAULT_TEMPERATURE", 0.7), 0, 2),
    maxRetries: clampInt(cfg.getNumber("LLM_MAX_RETRIES", 2), 0, 10),
    maxCapsuleWords: clampInt(cfg.getNumber("MAX_CAPSULE_WORDS", 400), 50, 2000),
    sttProvider: cfg.getChoice<SttProvider>("STT_PROVIDER", ["whisper-cpp", "http"], "whisper-cpp"),
    sttWhisperCppPath: cfg.get("STT_WHISPER_CPP_PATH", ""),
    sttModelPath: cfg.get("STT_MODEL_PATH", ""),
    sttLanguage: cfg.get("STT_LANGUAGE", "en"),
    sttHttpEndpoint: cfg.get("STT_HTTP_ENDPOINT", "http://127.0.0.1:8765/transcribe"),
    sttTimeoutMs: cfg.getNumber("STT_TIMEOUT_MS", 30_000),
    audioSampleRateHz: cfg.getNumber("AUDIO_SAMPLE_RATE", 16_000),
    audioChannels: clampInt(cfg.getNumber("AUDIO_CHANNELS", 1), 1, 2),
    audioInputDevice: cfg.get("AUDIO_INPUT_DEVICE", "") || undefined,
    silenceDetectionEnabled: cfg.getBoolean("SILENCE_DETECTION_ENABLED", true),
    silenceThreshold: cfg.getNumber("SILENCE_THRESHOLD", 150),
    silenceDurationMs: cfg.getNumber("SILENCE_DURATION_MS", 2_000),
    stopGraceMs: cfg.getNumber("STOP_GRACE_MS", 100),
    searchEnabled: cfg.getBoolean("INSIGHT_SEARCH_ENABLED", true),
    logLevel: cfg.getChoice<LogLevel>("LOG_LEVEL", LOG_LEVELS, "info")
  };
}

class EnvConfig {
  constructor(private readonly env: Env) {}

  get(key: string, fallback: string): string {
    const raw = this.env[key]?.trim();
    return raw ? raw : fallback;
  }

  getNumber(key: string, fallback: number): number {
    const raw = this.env[key]?.trim();
    if (!raw) {
      return fallback;
    }
    const n = Number(raw);
    return Number.isFinite(n) ? n : fallback;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const raw = this.env[key]?.trim().toLowerCase();
    if (!raw) {
      return fallback;
    }
    if (["true", "1", "yes", "on"].includes(raw)) return true;
    if (["false", "0", "no", "off"].includes(raw)) return false;
    return fallback;
  }

  getChoice<T extends string>(key: string, choices: readonly T[], fallback: T): T {
    const raw = this.env[key]?.trim().toLowerCase();
    return choices.find((c) => c === raw) ?? fallback;
  }
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
