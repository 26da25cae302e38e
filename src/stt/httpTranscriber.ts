import { readFile } from "node:fs/promises";
import { request, type Dispatcher } from "undici";
import { extractPcm16FromWav } from "../audio/wav";
import { TranscriptionFailedError, describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type { ITranscriber } from "../types/contracts";
import { isRecord } from "../utils";

interface HttpTranscriberOptions {
  endpoint: string;
  timeoutMs: number;
  sampleRateHz: number;
  channels: number;
  logger: Logger;
  dispatcher?: Dispatcher;
}

export class HttpTranscriber implements ITranscriber {
  constructor(private readonly options: HttpTranscriberOptions) {}

  async transcribe(audioPath: string): Promise<string> {
    let wavData: Buffer;
    try {
      wavData = await readFile(audioPath);
    } catch (error) {
      throw new TranscriptionFailedError(`Audio file not found: ${audioPath}`, { cause: error });
    }

    const pcm16 = extractPcm16FromWav(wavData);
    if (pcm16.length === 0) {
      return "";
    }

    const body = {
      audioBase64: pcm16.toString("base64"),
      sampleRateHz: this.options.sampleRateHz,
      channels: this.options.channels
    };

    let statusCode: number;
    let payload: unknown;
    try {
      const res = await request(this.options.endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json"
        },
        body: JSON.stringify(body),
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher
      });
      statusCode = res.statusCode;
      if (statusCode < 200 || statusCode >= 300) {
        await res.body.dump();
        throw new TranscriptionFailedError(`HTTP transcription failed (${statusCode})`);
      }
      payload = await res.body.json();
    } catch (error) {
      if (error instanceof TranscriptionFailedError) {
        throw error;
      }
      throw new TranscriptionFailedError(`HTTP transcription failed: ${describeError(error)}`, {
        cause: error
      });
    }

    const text = isRecord(payload) && typeof payload.text === "string" ? payload.text.trim() : "";
    this.options.logger.info("Transcription received", { status: statusCode, chars: text.length });
    return text;
  }
}
