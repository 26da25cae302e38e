import {
  BackendCallFailedError,
  GenerationUnavailableError,
  describeError
} from "../errors";
import type { Logger } from "../logging/logger";
import type {
  GenerationRequest,
  IGenerationBackend,
  ILocalGenerationBackend,
  ITextGenerator
} from "../types/contracts";
import { resolveRequest, type GenerationDefaults } from "./roles";

export interface HybridGeneratorOptions {
  preferLocal: boolean;
  defaults: GenerationDefaults;
  logger: Logger;
  createLocal?: () => ILocalGenerationBackend;
  /** May throw BackendUnavailableError when the credential is missing. */
  createRemote?: () => IGenerationBackend;
}

export interface BackendAvailability {
  local: boolean;
  remote: boolean;
}

/**
 * Prefers the local backend when asked to and it answered its probe, and
 * falls back to the remote backend. Availability is decided once, at creation.
 */
export class HybridGenerator implements ITextGenerator {
  private constructor(
    private readonly preferLocal: boolean,
    private readonly defaults: GenerationDefaults,
    private readonly logger: Logger,
    private readonly local: ILocalGenerationBackend | undefined,
    private readonly remote: IGenerationBackend | undefined
  ) {}

  static async create(options: HybridGeneratorOptions): Promise<HybridGenerator> {
    const { logger, preferLocal } = options;
    logger.info("Initializing hybrid generator", { preferLocal });

    let local: ILocalGenerationBackend | undefined;
    if (options.createLocal) {
      try {
        const candidate = options.createLocal();
        if (await candidate.isAvailable()) {
          local = candidate;
          logger.info("Local backend available", { backend: candidate.name });
        } else {
          logger.warn("Local backend not available; remote backend will be used", {
            backend: candidate.name
          });
        }
      } catch (error) {
        logger.error("Could not initialize local backend", { error: describeError(error) });
      }
    }

    let remote: IGenerationBackend | undefined;
    if (options.createRemote && (!local || !preferLocal)) {
      try {
        remote = options.createRemote();
        logger.info("Remote backend initialized", { backend: remote.name });
      } catch (error) {
        logger.warn("Could not initialize remote backend", { error: describeError(error) });
      }
    }

    if (!local && !remote) {
      logger.warn("No generation backend available; generation calls will fail");
    }

    return new HybridGenerator(preferLocal, options.defaults, logger, local, remote);
  }

  get availability(): BackendAvailability {
    return { local: this.local !== undefined, remote: this.remote !== undefined };
  }

  async generate(request: GenerationRequest): Promise<string> {
    const resolved = resolveRequest(request, this.defaults);
    const failures: BackendCallFailedError[] = [];

    if (this.preferLocal && this.local) {
      try {
        this.logger.info("Using local backend", { backend: this.local.name, role: resolved.role });
        return await this.local.generate(resolved);
      } catch (error) {
        const failure = BackendCallFailedError.fromApiError(this.local.name, error);
        failures.push(failure);
        this.logger.warn("Local generation failed; trying remote backend", {
          error: failure.message
        });
      }
    }

    if (this.remote) {
      try {
        this.logger.info("Using remote backend", { backend: this.remote.name, role: resolved.role });
        return await this.remote.generate(resolved);
      } catch (error) {
        failures.push(BackendCallFailedError.fromApiError(this.remote.name, error));
      }
    }

    const unavailable = new GenerationUnavailableError(
      failures.length === 0 ? "no-backend" : "all-failed",
      failures
    );
    this.logger.error(unavailable.message, { reason: unavailable.reason });
    throw unavailable;
  }
}
