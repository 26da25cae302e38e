import type { ITextGenerator } from "../types/contracts";

export class SynthesizerAgent {
  constructor(private readonly generator: ITextGenerator) {}

  generateCapsule(transcript: string, maxWords: number): Promise<string> {
    const prompt = [
      `Turn the following idea or transcript into a concise, high-insight capsule of approximately ${maxWords} words.`,
      "Capture the essence of the thought and its deeper implications.",
      "Skip conversational openings and closings; state the core insight directly.",
      "",
      "Transcript:",
      '"""',
      transcript,
      '"""',
      "",
      "Insight Capsule:"
    ].join("\n");

    return this.generator.generate({ prompt, role: "writing" });
  }
}
