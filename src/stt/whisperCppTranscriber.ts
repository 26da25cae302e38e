import { execFile } from "node:child_process";
import { access, mkdtemp, readFile, rm } from "node:fs/promises";
import { cpus, tmpdir } from "node:os";
import { join } from "node:path";
import { promisify } from "node:util";
import { TranscriptionFailedError, describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type { ITranscriber } from "../types/contracts";
import { commandExists } from "../utils";

const execFileAsync = promisify(execFile);

interface WhisperCppOptions {
  binaryPath: string;
  modelPath: string;
  language: string;
  timeoutMs: number;
  logger: Logger;
}

/** Runs whisper.cpp's CLI on a WAV file; the transcript is read from its `.txt` output. */
export class WhisperCppTranscriber implements ITranscriber {
  constructor(private readonly options: WhisperCppOptions) {}

  async transcribe(audioPath: string): Promise<string> {
    const { binaryPath, modelPath, language, timeoutMs, logger } = this.options;
    if (!(await isReadable(audioPath))) {
      throw new TranscriptionFailedError(`Audio file not found: ${audioPath}`);
    }
    if (!modelPath) {
      throw new TranscriptionFailedError("No whisper.cpp model configured (set STT_MODEL_PATH)");
    }

    const workDir = await mkdtemp(join(tmpdir(), "insight-stt-"));
    const outputBase = join(workDir, "transcript");
    const started = Date.now();

    try {
      await execFileAsync(
        binaryPath,
        [
          "--model", modelPath,
          "--language", language,
          "--threads", String(Math.min(cpus().length, 4)),
          "--output-txt",
          "--output-file", outputBase,
          "--no-timestamps",
          "--no-prints",
          audioPath
        ],
        { timeout: timeoutMs }
      );
    } catch (error) {
      await rm(workDir, { recursive: true, force: true });
      throw new TranscriptionFailedError(`whisper-cli failed: ${stderrExcerpt(error)}`, { cause: error });
    }

    try {
      const text = (await readFile(`${outputBase}.txt`, "utf-8")).trim();
      logger.info("Transcribed with whisper.cpp", { ms: Date.now() - started, chars: text.length });
      return text;
    } catch (error) {
      // No output file means whisper.cpp heard no speech.
      logger.debug("whisper.cpp wrote no transcript", { error: describeError(error) });
      return "";
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}

/** The configured binary if it exists, else the first whisper.cpp CLI name found on PATH. */
export async function findWhisperCppBinary(configured?: string): Promise<string | undefined> {
  if (configured && (await isReadable(configured))) {
    return configured;
  }
  const names =
    process.platform === "win32"
      ? ["whisper-cli.exe", "whisper-cpp.exe", "whisper.exe"]
      : ["whisper-cli", "whisper-cpp", "whisper"];
  for (const name of names) {
    if (await commandExists(name)) {
      return name;
    }
  }
  return undefined;
}

function stderrExcerpt(error: unknown): string {
  if (error instanceof Error && "stderr" in error && typeof error.stderr === "string" && error.stderr.trim()) {
    return error.stderr.trim().slice(0, 300);
  }
  return describeError(error);
}

function isReadable(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}
