import { describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type { IInsightIndex, ITextGenerator, InsightSearchHit } from "../types/contracts";

export const NO_INSIGHTS_ANSWER = "I couldn't find any relevant insights in your library for that query.";

export class SearcherAgent {
  constructor(
    private readonly index: IInsightIndex,
    private readonly generator: ITextGenerator,
    private readonly logger: Logger
  ) {}

  get insightCount(): number {
    return this.index.count();
  }

  /** Answers from the closest insights and lists them as sources. Generation errors propagate. */
  async synthesizeAnswer(query: string, n = 5): Promise<string> {
    let hits: InsightSearchHit[];
    try {
      hits = await this.index.search(query, n);
    } catch (error) {
      this.logger.error("Insight search failed", { error: describeError(error) });
      return NO_INSIGHTS_ANSWER;
    }

    if (hits.length === 0) {
      this.logger.info("No insights matched", { queryChars: query.length });
      return NO_INSIGHTS_ANSWER;
    }

    const context = hits.map((hit, i) => `[Insight ${i + 1}]\n${hit.text}`).join("\n\n");
    const sources = hits.map((hit, i) => {
      const date = hit.metadata.timestamp ? ` (${hit.metadata.timestamp.slice(0, 10)})` : "";
      return `- Insight ${i + 1}: ${hit.metadata.title || "Untitled"}${date}`;
    });

    const prompt = [
      "Answer the question using only the insights from the user's personal library below.",
      "Combine insights where that helps. If they do not hold enough to answer, say so.",
      "",
      `Question: ${query}`,
      "",
      "Relevant Insights:",
      context,
      "",
      "Answer:"
    ].join("\n");

    this.logger.info("Synthesizing answer", { hits: hits.length });
    const answer = await this.generator.generate({ prompt, role: "fact_check" });
    return `${answer}\n\nSources:\n${sources.join("\n")}`;
  }
}
