import OpenAI, { type ClientOptions } from "openai";
import { BackendCallFailedError, BackendUnavailableError } from "../errors";
import type { Logger } from "../logging/logger";
import type {
  GenerationRole,
  IGenerationBackend,
  ResolvedGenerationRequest
} from "../types/contracts";
import { runAttempts } from "./attempts";

interface OpenAiGeneratorOptions {
  apiKey: string | undefined;
  baseUrl: string;
  models: Record<GenerationRole, string>;
  timeoutMs: number;
  logger: Logger;
  fetch?: ClientOptions["fetch"];
}

export class OpenAiGenerator implements IGenerationBackend {
  readonly name = "openai" as const;
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiGeneratorOptions) {
    if (!options.apiKey) {
      throw new BackendUnavailableError(this.name, "OpenAI API key not provided");
    }
    // Attempts are owned by runAttempts, so the SDK must not retry on its own.
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
      fetch: options.fetch
    });
  }

  modelFor(role: GenerationRole): string {
    return this.options.models[role];
  }

  async generate(req: ResolvedGenerationRequest): Promise<string> {
    const model = this.modelFor(req.role);
    return runAttempts(this.name, req.maxRetries, this.options.logger, async (attempt) => {
      this.options.logger.debug("Calling remote model", { model, attempt });
      const completion = await this.client.chat.completions.create({
        model,
        messages: [
          { role: "system", content: req.systemPrompt },
          { role: "user", content: req.prompt }
        ],
        temperature: req.temperature
      });

      const content = completion.choices[0]?.message?.content;
      if (typeof content !== "string") {
        throw new BackendCallFailedError(this.name, "OpenAI returned no message content");
      }
      return content;
    });
  }
}
