import type { InsightCapsuleSettings } from "./config/settings";
import type { ProcessingResult } from "./types/contracts";
import { countWords } from "./utils";

export interface CliArgs {
  audio?: string;
  externalLlm: boolean;
  noSilence: boolean;
  help: boolean;
}

export const USAGE = [
  "Usage: insight-capsule [options]",
  "",
  "  --audio <file>   Process an existing WAV file and exit",
  "  --external-llm   Prefer the remote OpenAI backend over the local one",
  "  --no-silence     Disable silence auto-stop",
  "  --help           Show this message",
  "",
  "Without --audio an interactive prompt starts. Commands:",
  "  start | stop | toggle | status | search <query> | outline | draft | takeaways | quit"
].join("\n");

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { externalLlm: false, noSilence: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--audio":
        args.audio = argv[++i];
        if (!args.audio) {
          throw new Error("--audio needs a file path");
        }
        break;
      case "--external-llm":
        args.externalLlm = true;
        break;
      case "--no-silence":
        args.noSilence = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${argv[i]}`);
    }
  }
  return args;
}

export function applyArgs(settings: InsightCapsuleSettings, args: CliArgs): InsightCapsuleSettings {
  return {
    ...settings,
    preferLocal: args.externalLlm ? false : settings.preferLocal,
    silenceDetectionEnabled: args.noSilence ? false : settings.silenceDetectionEnabled
  };
}

export function formatResult(result: ProcessingResult): string {
  return [
    `  Title:      ${result.title}`,
    `  Transcript: ${countWords(result.transcript)} words`,
    `  Capsule:    ${countWords(result.capsule)} words`,
    `  Tags:       ${result.tags.length > 0 ? result.tags.map((t) => `#${t}`).join(" ") : "none"}`,
    `  Log saved:  ${result.logPath}`
  ].join("\n");
}
