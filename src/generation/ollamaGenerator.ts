import { request, type Dispatcher } from "undici";
import { BackendCallFailedError } from "../errors";
import type { Logger } from "../logging/logger";
import type { ILocalGenerationBackend, ResolvedGenerationRequest } from "../types/contracts";
import { isRecord, safeParseJson, sanitizeForLog } from "../utils";
import { runAttempts } from "./attempts";

interface OllamaGeneratorOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  probeTimeoutMs: number;
  logger: Logger;
  dispatcher?: Dispatcher;
}

interface OllamaReply {
  statusCode: number;
  raw: string;
}

export class OllamaGenerator implements ILocalGenerationBackend {
  readonly name = "ollama" as const;

  constructor(private readonly options: OllamaGeneratorOptions) {
    options.logger.info("Local generator configured", {
      url: options.baseUrl,
      model: options.model
    });
  }

  async generate(req: ResolvedGenerationRequest): Promise<string> {
    return runAttempts(this.name, req.maxRetries, this.options.logger, () => this.callOnce(req));
  }

  async isAvailable(): Promise<boolean> {
    const { baseUrl, model, probeTimeoutMs, logger, dispatcher } = this.options;
    try {
      const res = await request(`${baseUrl}/api/tags`, {
        method: "GET",
        headersTimeout: probeTimeoutMs,
        bodyTimeout: probeTimeoutMs,
        dispatcher
      });
      if (res.statusCode !== 200) {
        await res.body.dump();
        logger.debug("Local availability probe failed", { status: res.statusCode });
        return false;
      }

      const payload: unknown = await res.body.json();
      if (!listsModel(payload, model)) {
        logger.warn(`Local model is not present; run 'ollama pull ${model}' or change LOCAL_LLM_MODEL`, {
          model
        });
        return false;
      }
      return true;
    } catch (error) {
      logger.debug("Local backend not reachable", {
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }

  private async callOnce(req: ResolvedGenerationRequest): Promise<string> {
    const options = { temperature: req.temperature };

    let reply = await this.post("/api/generate", {
      model: this.options.model,
      prompt: `${req.systemPrompt}\n\n${req.prompt}`,
      stream: false,
      options
    });

    if (reply.statusCode === 404) {
      this.options.logger.info("Local /api/generate returned 404; retrying with /api/chat");
      reply = await this.post("/api/chat", {
        model: this.options.model,
        messages: [
          { role: "system", content: req.systemPrompt },
          { role: "user", content: req.prompt }
        ],
        stream: false,
        options
      });
    }

    if (reply.statusCode < 200 || reply.statusCode >= 300) {
      throw new BackendCallFailedError(
        this.name,
        `Ollama request failed (${reply.statusCode})`,
        reply.statusCode,
        sanitizeForLog(reply.raw).slice(0, 300)
      );
    }

    const text = extractResponseText(safeParseJson(reply.raw));
    if (text === undefined) {
      throw new BackendCallFailedError(this.name, "Ollama returned a malformed payload");
    }
    return text;
  }

  private async post(path: string, body: unknown): Promise<OllamaReply> {
    const res = await request(`${this.options.baseUrl}${path}`, {
      method: "POST",
      headers: {
        "content-type": "application/json"
      },
      body: JSON.stringify(body),
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
      dispatcher: this.options.dispatcher
    });

    return { statusCode: res.statusCode, raw: await res.body.text() };
  }
}

/**
 * Normalizes the generate endpoint's `{response}` and the chat endpoint's
 * `{message: {content}}` into plain text. Undefined means neither shape matched.
 */
export function extractResponseText(payload: unknown): string | undefined {
  if (typeof payload === "string") {
    return payload;
  }
  if (!isRecord(payload)) {
    return undefined;
  }
  if (typeof payload.response === "string") {
    return payload.response;
  }
  const message = payload.message;
  if (isRecord(message) && typeof message.content === "string") {
    return message.content;
  }
  return undefined;
}

function listsModel(payload: unknown, model: string): boolean {
  if (!isRecord(payload) || !Array.isArray(payload.models)) {
    return false;
  }
  const wanted = new Set([model, model.includes(":") ? model : `${model}:latest`]);
  return payload.models.some(
    (tag) =>
      isRecord(tag) &&
      ((typeof tag.name === "string" && wanted.has(tag.name)) ||
        (typeof tag.model === "string" && wanted.has(tag.model)))
  );
}
