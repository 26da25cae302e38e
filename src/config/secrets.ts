import { readFile } from "node:fs/promises";

const API_KEY_ENV = "OPENAI_API_KEY";
const API_KEY_FILE_ENV = "OPENAI_API_KEY_FILE";

export class SecretsManager {
  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  /** The key from the environment, or else the first line of the file named by OPENAI_API_KEY_FILE. */
  async getOpenAiApiKey(): Promise<string | undefined> {
    const direct = this.env[API_KEY_ENV]?.trim();
    if (direct) {
      return direct;
    }

    const keyFile = this.env[API_KEY_FILE_ENV]?.trim();
    if (!keyFile) {
      return undefined;
    }

    let raw: string;
    try {
      raw = await readFile(keyFile, "utf8");
    } catch {
      return undefined;
    }
    return raw.split(/\r?\n/)[0]?.trim() || undefined;
  }
}
