import { InvalidGenerationRequestError } from "../errors";
import type {
  GenerationRequest,
  GenerationRole,
  ResolvedGenerationRequest
} from "../types/contracts";
import { clamp, clampInt } from "../utils";

export const GENERATION_ROLES: readonly GenerationRole[] = ["writing", "fact_check", "expander"];

export const DEFAULT_ROLE: GenerationRole = "writing";

const ROLE_SYSTEM_PROMPTS: Record<GenerationRole, string> = {
  writing: "You are a concise, insightful writing assistant. Create clear, engaging content.",
  fact_check: "You are a careful fact-checking assistant. Verify claims and note uncertainties.",
  expander: "You are a creative assistant who helps structure and expand ideas clearly."
};

export function normalizeRole(role: string | undefined): GenerationRole {
  return GENERATION_ROLES.find((r) => r === role) ?? DEFAULT_ROLE;
}

export function systemPromptForRole(role: GenerationRole): string {
  return ROLE_SYSTEM_PROMPTS[role];
}

export interface GenerationDefaults {
  temperature: number;
  maxRetries: number;
}

export function resolveRequest(
  request: GenerationRequest,
  defaults: GenerationDefaults
): ResolvedGenerationRequest {
  const prompt = request.prompt;
  if (!prompt.trim()) {
    throw new InvalidGenerationRequestError("Generation prompt must not be empty");
  }

  const role = normalizeRole(request.role);
  const temperature = request.temperature ?? defaults.temperature;
  const maxRetries = request.maxRetries ?? defaults.maxRetries;

  return {
    prompt,
    role,
    temperature: clamp(Number.isFinite(temperature) ? temperature : defaults.temperature, 0, 2),
    systemPrompt: request.systemPrompt?.trim() || systemPromptForRole(role),
    maxRetries: clampInt(Number.isFinite(maxRetries) ? maxRetries : defaults.maxRetries, 0, 10)
  };
}
