import { describe, expect, test } from "vitest";
import { DrafterAgent } from "../src/agents/drafter";
import { NO_INSIGHTS_ANSWER, SearcherAgent } from "../src/agents/searcher";
import { SynthesizerAgent } from "../src/agents/synthesizer";
import type {
  GenerationRequest,
  IInsightIndex,
  ITextGenerator,
  InsightMetadata,
  InsightSearchHit
} from "../src/types/contracts";
import { memoryLogger } from "./helpers";

class RecordingGenerator implements ITextGenerator {
  readonly requests: GenerationRequest[] = [];
  constructor(private readonly reply = "generated") {}

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.reply;
  }
}

class StaticIndex implements IInsightIndex {
  constructor(private readonly hits: InsightSearchHit[]) {}

  async add(_id: string, _t: string, _c: string, _m: InsightMetadata): Promise<boolean> {
    return true;
  }

  async search(_query: string, limit: number): Promise<InsightSearchHit[]> {
    return this.hits.slice(0, limit);
  }

  count(): number {
    return this.hits.length;
  }
}

function hit(id: string, title: string, timestamp: string): InsightSearchHit {
  return {
    id,
    text: `${title} transcript\n\n${title} capsule`,
    metadata: { title, tags: [], timestamp, logPath: `/logs/${id}.md` },
    score: 0.9
  };
}

describe("SynthesizerAgent", () => {
  test("asks for a capsule of the target length with the writing role", async () => {
    const generator = new RecordingGenerator("capsule");
    const agent = new SynthesizerAgent(generator);

    await expect(agent.generateCapsule("an idea about tides", 250)).resolves.toBe("capsule");
    const [request] = generator.requests;
    expect(request.role).toBe("writing");
    expect(request.prompt).toContain("approximately 250 words");
    expect(request.prompt).toContain('"""\nan idea about tides\n"""');
    expect(request.prompt.endsWith("Insight Capsule:")).toBe(true);
  });
});

describe("DrafterAgent", () => {
  test("outline includes the original thought when given", async () => {
    const generator = new RecordingGenerator();
    const drafter = new DrafterAgent(generator, memoryLogger().logger);

    await drafter.generateBlogOutline("the capsule", "the transcript", 4);

    const [request] = generator.requests;
    expect(request.role).toBe("writing");
    expect(request.prompt).toContain("Original thought:\nthe transcript\n");
    expect(request.prompt).toContain('Insight:\n"""the capsule"""');
    expect(request.prompt).toContain("Create a 4-point outline");
  });

  test("draft uses the expander role and the word target", async () => {
    const generator = new RecordingGenerator();
    const drafter = new DrafterAgent(generator, memoryLogger().logger);

    await drafter.generateFirstDraft("the capsule");

    const [request] = generator.requests;
    expect(request.role).toBe("expander");
    expect(request.prompt).toContain("approximately 800 words");
    expect(request.prompt).not.toContain("Original thought:");
  });

  test("takeaways default to five", async () => {
    const generator = new RecordingGenerator();
    const drafter = new DrafterAgent(generator, memoryLogger().logger);

    await drafter.generateKeyTakeaways("the capsule");

    expect(generator.requests[0].prompt).toContain("list 5 key takeaways");
  });
});

describe("SearcherAgent", () => {
  test("answers from the hits and lists them as sources", async () => {
    const generator = new RecordingGenerator("Tides follow the moon.");
    const index = new StaticIndex([
      hit("a", "Moon notes", "2024-02-01T08:00:00.000Z"),
      hit("b", "", "")
    ]);
    const searcher = new SearcherAgent(index, generator, memoryLogger().logger);

    const answer = await searcher.synthesizeAnswer("what moves tides?", 5);

    expect(answer).toBe(
      "Tides follow the moon.\n\nSources:\n- Insight 1: Moon notes (2024-02-01)\n- Insight 2: Untitled"
    );
    const [request] = generator.requests;
    expect(request.role).toBe("fact_check");
    expect(request.prompt).toContain("Question: what moves tides?");
    expect(request.prompt).toContain("[Insight 1]\nMoon notes transcript\n\nMoon notes capsule\n\n[Insight 2]");
  });

  test("answers with a fixed sentence and no generation when nothing matches", async () => {
    const generator = new RecordingGenerator();
    const searcher = new SearcherAgent(new StaticIndex([]), generator, memoryLogger().logger);

    await expect(searcher.synthesizeAnswer("anything")).resolves.toBe(NO_INSIGHTS_ANSWER);
    expect(generator.requests).toHaveLength(0);
    expect(searcher.insightCount).toBe(0);
  });
});
