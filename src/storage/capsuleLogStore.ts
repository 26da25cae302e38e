import { appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { StorageFailedError, describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type { CapsuleLogEntry, ICapsuleStore } from "../types/contracts";
import { pad2 } from "../utils";

const INDEX_HEADER = "# Capsule Log Index\n\n";

/** Markdown session logs plus a newest-first `index.md`. */
export class CapsuleLogStore implements ICapsuleStore {
  readonly indexPath: string;

  constructor(
    private readonly logsDir: string,
    private readonly logger: Logger
  ) {
    this.indexPath = join(logsDir, "index.md");
  }

  async saveLog(entry: CapsuleLogEntry): Promise<string> {
    const { title, transcript, capsule, tags, timestamp } = entry;
    const filename = `${fileTimestamp(timestamp)}-${sanitizeFilename(title)}.md`;
    const logPath = join(this.logsDir, filename);

    try {
      await mkdir(this.logsDir, { recursive: true });
      await writeFile(logPath, renderLog(entry), "utf-8");
    } catch (error) {
      throw new StorageFailedError(`Failed to save log to ${logPath}: ${describeError(error)}`, {
        cause: error
      });
    }

    const linkText = title.trim() ? title : "Untitled Entry";
    await this.updateIndex(linkText, filename, timestamp, tags);
    this.logger.info("Capsule log saved", { path: logPath, transcriptChars: transcript.length, capsuleChars: capsule.length });
    return logPath;
  }

  extractTags(text: string): string[] {
    return Array.from(text.matchAll(/#(\w+)/g), (m) => m[1]);
  }

  async appendSection(logPath: string, sectionTitle: string, content: string): Promise<void> {
    try {
      await appendFile(logPath, `\n\n---\n\n## ${sectionTitle}\n\n${content.trim()}\n`, "utf-8");
    } catch (error) {
      throw new StorageFailedError(
        `Failed to append "${sectionTitle}" to ${basename(logPath)}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private async updateIndex(title: string, filename: string, timestamp: Date, tags: string[]): Promise<void> {
    const tagText = tags.map((t) => `#${t}`).join(" ");
    const entry = `- [${title}](./${filename}) — ${displayTimestamp(timestamp)} ${tagText}\n`;

    try {
      const current = await readFile(this.indexPath, "utf-8").catch((error: unknown) => {
        if (isMissingFile(error)) {
          return "";
        }
        throw error;
      });
      const rest = current.startsWith(INDEX_HEADER) ? current.slice(INDEX_HEADER.length) : current;
      await writeFile(this.indexPath, INDEX_HEADER + entry + rest, "utf-8");
    } catch (error) {
      this.logger.warn("Failed to update index; appending instead", {
        path: this.indexPath,
        error: describeError(error)
      });
      try {
        await appendFile(this.indexPath, entry, "utf-8");
      } catch (appendError) {
        this.logger.error("Fallback append to index failed", {
          file: filename,
          error: describeError(appendError)
        });
      }
    }
  }
}

export function sanitizeFilename(name: string): string {
  const safe = name
    .replace(/[^\w\s-]/g, "")
    .replace(/\s+/g, "-")
    .toLowerCase()
    .replace(/^[-_]+|[-_]+$/g, "");
  return safe || "untitled";
}

function renderLog({ title, transcript, capsule, tags, timestamp }: CapsuleLogEntry): string {
  const tagLine = tags.length > 0 ? tags.map((t) => `#${t}`).join(" ") : "None";
  const transcriptText = transcript.trim() || "Transcript was empty.";
  const capsuleText = capsule.trim() || "Capsule was empty or generation failed.";
  return [
    `# Insight Capsule Log — ${displayTimestamp(timestamp)}`,
    `**Title:** ${title}`,
    `**Tags:** ${tagLine}`,
    "",
    "**Transcript:** ```text",
    transcriptText,
    "```",
    "",
    "**Insight Capsule:**",
    capsuleText,
    ""
  ].join("\n");
}

function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}-` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

function displayTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
