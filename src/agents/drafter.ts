import type { Logger } from "../logging/logger";
import type { ITextGenerator } from "../types/contracts";

/** Turns a capsule into publishable material: an outline, a draft, takeaways. */
export class DrafterAgent {
  constructor(
    private readonly generator: ITextGenerator,
    private readonly logger: Logger
  ) {}

  generateBlogOutline(capsule: string, transcript?: string, points = 5): Promise<string> {
    const prompt = [
      "You are a content strategist turning an insight into a blog post outline.",
      "",
      ...originalThought(transcript),
      "Insight:",
      quoted(capsule),
      "",
      `Create a ${points}-point outline with a compelling title, a brief introduction,`,
      `${points} numbered main sections with one-line descriptions, and a brief conclusion.`,
      "Aim it at readers who want practical, actionable guidance.",
      "",
      "Blog Post Outline:"
    ].join("\n");

    this.logger.info("Generating blog outline", { points });
    return this.generator.generate({ prompt, role: "writing" });
  }

  generateFirstDraft(capsule: string, transcript?: string, targetWords = 800): Promise<string> {
    const prompt = [
      "You are a content writer turning an insight into a first draft of a blog post.",
      "",
      ...originalThought(transcript),
      "Insight:",
      quoted(capsule),
      "",
      `Write a first draft of approximately ${targetWords} words.`,
      "Keep it conversational and concrete, with specific examples where they help, and avoid jargon.",
      "",
      "First Draft:"
    ].join("\n");

    this.logger.info("Generating first draft", { targetWords });
    return this.generator.generate({ prompt, role: "expander" });
  }

  generateKeyTakeaways(capsule: string, count = 5): Promise<string> {
    const prompt = [
      `Based on the following insight, list ${count} key takeaways.`,
      "Keep each one short and actionable. Format them as a numbered list.",
      "",
      "Insight:",
      quoted(capsule),
      "",
      "Key Takeaways:"
    ].join("\n");

    this.logger.info("Generating key takeaways", { count });
    return this.generator.generate({ prompt, role: "writing" });
  }
}

function originalThought(transcript: string | undefined): string[] {
  return transcript?.trim() ? ["Original thought:", transcript.trim(), ""] : [];
}

function quoted(text: string): string {
  return `"""${text}"""`;
}
