import { writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { describe, expect, test } from "vitest";
import { SecretsManager } from "../src/config/secrets";
import { readSettings } from "../src/config/settings";
import { withTempDir } from "./helpers";

describe("readSettings", () => {
  test("falls back to defaults for an empty environment", () => {
    const settings = readSettings({});

    expect(settings.dataDir).toBe(resolve("./data"));
    expect(settings.preferLocal).toBe(true);
    expect(settings.localLlmUrl).toBe("http://localhost:11434");
    expect(settings.localLlmModel).toBe("llama3.2");
    expect(settings.localTimeoutMs).toBe(120_000);
    expect(settings.localProbeTimeoutMs).toBe(5_000);
    expect(settings.remoteModels).toEqual({
      writing: "gpt-4o-mini",
      fact_check: "gpt-4o-mini",
      expander: "gpt-4o-mini"
    });
    expect(settings.defaultTemperature).toBe(0.7);
    expect(settings.maxRetries).toBe(2);
    expect(settings.sttProvider).toBe("whisper-cpp");
    expect(settings.audioInputDevice).toBeUndefined();
    expect(settings.silenceDetectionEnabled).toBe(true);
    expect(settings.silenceThreshold).toBe(150);
    expect(settings.silenceDurationMs).toBe(2_000);
    expect(settings.stopGraceMs).toBe(100);
    expect(settings.logLevel).toBe("info");
  });

  test("reads overrides from the environment", () => {
    const settings = readSettings({
      INSIGHT_DATA_DIR: "/var/insight",
      USE_LOCAL_LLM: "no",
      LOCAL_LLM_URL: "http://gpu-box:11434/",
      GPT_MODEL_FACT_CHECK: "checker",
      SILENCE_DURATION_MS: "3500",
      STT_PROVIDER: "HTTP",
      AUDIO_INPUT_DEVICE: "hw:1,0",
      LOG_LEVEL: "debug"
    });

    expect(settings.dataDir).toBe(resolve("/var/insight"));
    expect(settings.preferLocal).toBe(false);
    expect(settings.localLlmUrl).toBe("http://gpu-box:11434");
    expect(settings.remoteModels.fact_check).toBe("checker");
    expect(settings.remoteModels.writing).toBe("gpt-4o-mini");
    expect(settings.silenceDurationMs).toBe(3500);
    expect(settings.sttProvider).toBe("http");
    expect(settings.audioInputDevice).toBe("hw:1,0");
    expect(settings.logLevel).toBe("debug");
  });

  test("ignores values it cannot parse", () => {
    const settings = readSettings({
      USE_LOCAL_LLM: "maybe",
      LLM_MAX_RETRIES: "lots",
      LOG_LEVEL: "verbose",
      STT_PROVIDER: "cloud"
    });

    expect(settings.preferLocal).toBe(true);
    expect(settings.maxRetries).toBe(2);
    expect(settings.logLevel).toBe("info");
    expect(settings.sttProvider).toBe("whisper-cpp");
  });

  test("clamps out-of-range numbers", () => {
    const settings = readSettings({ DEFAULT_TEMPERATURE: "9", LLM_MAX_RETRIES: "50", AUDIO_CHANNELS: "6" });

    expect(settings.defaultTemperature).toBe(2);
    expect(settings.maxRetries).toBe(10);
    expect(settings.audioChannels).toBe(2);
  });
});

describe("SecretsManager", () => {
  test("prefers the key in the environment", async () => {
    const secrets = new SecretsManager({ OPENAI_API_KEY: " test-secret ", OPENAI_API_KEY_FILE: "/nowhere" });
    await expect(secrets.getOpenAiApiKey()).resolves.toBe("test-secret");
  });

  test("reads the first line of the key file", async () => {
    const { dir, cleanup } = await withTempDir();
    try {
      const keyFile = join(dir, "key.txt");
      await writeFile(keyFile, "test-secret-from-file\nsecond line\n");
      const secrets = new SecretsManager({ OPENAI_API_KEY_FILE: keyFile });
      await expect(secrets.getOpenAiApiKey()).resolves.toBe("test-secret-from-file");
    } finally {
      await cleanup();
    }
  });

  test("is undefined when nothing is configured or the file is missing", async () => {
    await expect(new SecretsManager({}).getOpenAiApiKey()).resolves.toBeUndefined();
    await expect(
      new SecretsManager({ OPENAI_API_KEY_FILE: "/definitely/not/here" }).getOpenAiApiKey()
    ).resolves.toBeUndefined();
  });
});
